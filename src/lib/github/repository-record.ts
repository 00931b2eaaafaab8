import { MalformedRecordError } from "../errors";
import type { RepositoryColumn, RepositoryRecord } from "../../types/github";

/**
 * Fixed column order of the output file; the header row names them verbatim
 */
export const REPOSITORY_COLUMNS: readonly RepositoryColumn[] = [
  "id",
  "node_id",
  "name",
  "full_name",
  "owner",
  "owner_type",
  "private",
  "visibility",
  "description",
  "fork",
  "homepage",
  "language",
  "default_branch",
  "topics",
  "license",
  "archived",
  "disabled",
  "is_template",
  "has_issues",
  "has_projects",
  "has_wiki",
  "has_pages",
  "has_downloads",
  "has_discussions",
  "forks_count",
  "stargazers_count",
  "watchers_count",
  "subscribers_count",
  "network_count",
  "open_issues_count",
  "size",
  "created_at",
  "updated_at",
  "pushed_at",
  "html_url",
  "url",
  "clone_url",
  "git_url",
  "ssh_url",
  "svn_url",
  "mirror_url",
];

const TOPIC_SEPARATOR = ";";

interface RecordLike {
  [key: string]: unknown;
}

function isRecordLike(value: unknown): value is RecordLike {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function malformed(field: string, expected: string, value: unknown): MalformedRecordError {
  const actual = value === null ? "null" : Array.isArray(value) ? "array" : typeof value;
  return new MalformedRecordError(
    `Malformed repository record: ${field} must be ${expected}, got ${actual}`,
    field
  );
}

function requireString(source: RecordLike, key: string, field: string = key): string {
  const value = source[key];
  if (typeof value !== "string") throw malformed(field, "a string", value);
  return value;
}

function optionalString(source: RecordLike, key: string, field: string = key): string | null {
  const value = source[key];
  if (value === undefined || value === null) return null;
  if (typeof value !== "string") throw malformed(field, "a string or null", value);
  return value;
}

function requireBoolean(source: RecordLike, key: string): boolean {
  const value = source[key];
  if (typeof value !== "boolean") throw malformed(key, "a boolean", value);
  return value;
}

function optionalBoolean(source: RecordLike, key: string): boolean | null {
  const value = source[key];
  if (value === undefined || value === null) return null;
  if (typeof value !== "boolean") throw malformed(key, "a boolean or null", value);
  return value;
}

function optionalCount(source: RecordLike, key: string): number | null {
  const value = source[key];
  if (value === undefined || value === null) return null;
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw malformed(key, "a non-negative integer or null", value);
  }
  return value;
}

function requireId(source: RecordLike): number {
  const value = source.id;
  if (typeof value !== "number" || !Number.isSafeInteger(value) || value <= 0) {
    throw malformed("id", "a positive integer", value);
  }
  return value;
}

function parseOwner(source: RecordLike): { login: string; type: string | null } {
  const owner = source.owner;
  if (!isRecordLike(owner)) throw malformed("owner", "an object", owner);
  return {
    login: requireString(owner, "login", "owner.login"),
    type: optionalString(owner, "type", "owner.type"),
  };
}

function parseLicense(source: RecordLike): string | null {
  const license = source.license;
  if (license === undefined || license === null) return null;
  if (!isRecordLike(license)) throw malformed("license", "an object or null", license);
  return optionalString(license, "spdx_id", "license.spdx_id");
}

function parseTopics(source: RecordLike): string[] {
  const topics = source.topics;
  if (topics === undefined || topics === null) return [];
  if (!Array.isArray(topics)) throw malformed("topics", "an array of strings", topics);

  return topics.map((topic: unknown, index) => {
    if (typeof topic !== "string") throw malformed(`topics[${index}]`, "a string", topic);
    return topic;
  });
}

/**
 * Validate an untyped API payload into a RepositoryRecord
 */
export function parseRepositoryRecord(raw: unknown): RepositoryRecord {
  if (!isRecordLike(raw)) {
    throw malformed("repository", "an object", raw);
  }

  const id = requireId(raw);
  const owner = parseOwner(raw);

  return {
    id,
    node_id: optionalString(raw, "node_id"),
    name: requireString(raw, "name"),
    full_name: requireString(raw, "full_name"),
    owner: owner.login,
    owner_type: owner.type,
    private: requireBoolean(raw, "private"),
    visibility: optionalString(raw, "visibility"),
    description: optionalString(raw, "description"),
    fork: requireBoolean(raw, "fork"),
    homepage: optionalString(raw, "homepage"),
    language: optionalString(raw, "language"),
    default_branch: optionalString(raw, "default_branch"),
    topics: parseTopics(raw),
    license: parseLicense(raw),
    archived: optionalBoolean(raw, "archived"),
    disabled: optionalBoolean(raw, "disabled"),
    is_template: optionalBoolean(raw, "is_template"),
    has_issues: optionalBoolean(raw, "has_issues"),
    has_projects: optionalBoolean(raw, "has_projects"),
    has_wiki: optionalBoolean(raw, "has_wiki"),
    has_pages: optionalBoolean(raw, "has_pages"),
    has_downloads: optionalBoolean(raw, "has_downloads"),
    has_discussions: optionalBoolean(raw, "has_discussions"),
    forks_count: optionalCount(raw, "forks_count"),
    stargazers_count: optionalCount(raw, "stargazers_count"),
    watchers_count: optionalCount(raw, "watchers_count"),
    subscribers_count: optionalCount(raw, "subscribers_count"),
    network_count: optionalCount(raw, "network_count"),
    open_issues_count: optionalCount(raw, "open_issues_count"),
    size: optionalCount(raw, "size"),
    created_at: optionalString(raw, "created_at"),
    updated_at: optionalString(raw, "updated_at"),
    pushed_at: optionalString(raw, "pushed_at"),
    html_url: requireString(raw, "html_url"),
    url: requireString(raw, "url"),
    clone_url: optionalString(raw, "clone_url"),
    git_url: optionalString(raw, "git_url"),
    ssh_url: optionalString(raw, "ssh_url"),
    svn_url: optionalString(raw, "svn_url"),
    mirror_url: optionalString(raw, "mirror_url"),
  };
}

function formatCell(value: RepositoryRecord[RepositoryColumn]): string {
  if (value === null) return "";
  if (Array.isArray(value)) return value.join(TOPIC_SEPARATOR);
  return String(value);
}

/**
 * Flatten a record into one unescaped cell per column, in column order
 */
export function toRow(record: RepositoryRecord): string[] {
  return REPOSITORY_COLUMNS.map((column) => formatCell(record[column]));
}
