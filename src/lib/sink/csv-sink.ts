import * as fs from "fs";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { logger } from "../logger";
import { MalformedOutputError } from "../errors";
import { REPOSITORY_COLUMNS, toRow } from "../github/repository-record";
import type { RepositoryRecord } from "../../types/github";

const TAIL_CHUNK_BYTES = 64 * 1024;
const NEWLINE = 0x0a;

export interface SinkOptions {
  // fsync after every row
  fsync?: boolean;
}

export interface RepositorySink {
  readonly cursor: number | null;
  readonly written: number;
  append(record: RepositoryRecord): void;
  close(): void;
}

const HEADER_LINE = Buffer.from(stringify([Array.from(REPOSITORY_COLUMNS)]), "utf-8");
const ID_INDEX = REPOSITORY_COLUMNS.indexOf("id");

interface ResumePoint {
  // bytes up to the end of the last complete row
  completeSize: number;
  cursor: number | null;
}

function readRange(fd: number, start: number, end: number): Buffer {
  const buffer = Buffer.alloc(end - start);
  let offset = 0;
  while (offset < buffer.length) {
    const bytesRead = fs.readSync(fd, buffer, offset, buffer.length - offset, start + offset);
    if (bytesRead === 0) {
      break;
    }
    offset += bytesRead;
  }
  return buffer.subarray(0, offset);
}

function tryParse(chunk: Buffer): unknown[] | null {
  try {
    const rows: unknown = parse(chunk, { relax_column_count: true });
    return Array.isArray(rows) ? rows : null;
  } catch {
    return null;
  }
}

function isDataRow(row: unknown): row is string[] {
  return Array.isArray(row) &&
    row.length === REPOSITORY_COLUMNS.length &&
    row.every((cell): cell is string => typeof cell === "string") &&
    /^\d+$/.test(row[ID_INDEX]);
}

function isUnclosedQuote(error: unknown): boolean {
  return typeof error === "object" && error !== null &&
    "code" in error && error.code === "CSV_QUOTE_NOT_CLOSED";
}

/**
 * A write cut off mid-row leaves bytes without a final newline, or a quoted
 * multi-line cell that never closes.
 */
function isCutOff(fragment: Buffer): boolean {
  if (fragment[fragment.length - 1] !== NEWLINE) {
    return true;
  }
  try {
    parse(fragment, { relax_column_count: true });
    return false;
  } catch (error) {
    return isUnclosedQuote(error);
  }
}

function describeBadRow(filePath: string, fragment: Buffer): MalformedOutputError {
  const rows = tryParse(fragment) ?? [];
  const last = rows[rows.length - 1];

  if (Array.isArray(last) && last.length === REPOSITORY_COLUMNS.length) {
    return new MalformedOutputError(`Last row of ${filePath} has a non-integer id: "${String(last[ID_INDEX])}"`, filePath);
  }
  if (Array.isArray(last)) {
    return new MalformedOutputError(
      `Last row of ${filePath} has ${last.length} cells, expected ${REPOSITORY_COLUMNS.length}`,
      filePath
    );
  }
  return new MalformedOutputError(`Cannot parse the end of ${filePath}`, filePath);
}

/**
 * Find the last complete data row by parsing only the tail of the file.
 *
 * Row boundaries are the bytes after a newline. A newline inside a quoted
 * cell is also such a byte, so each candidate slice must parse to exactly one
 * row of the full width with an integer id. The window grows until a row is
 * found or it reaches back to the header.
 */
function findLastRow(fd: number, size: number, headerSize: number): { id: number; end: number } | null {
  let windowBytes = TAIL_CHUNK_BYTES;

  for (;;) {
    // one byte before the data so the header's newline counts as a boundary
    const base = Math.max(headerSize - 1, size - windowBytes);
    const window = readRange(fd, base, size);
    const boundaries: number[] = [];
    for (let index = window.indexOf(NEWLINE); index !== -1; index = window.indexOf(NEWLINE, index + 1)) {
      boundaries.push(base + index + 1);
    }

    for (let e = boundaries.length - 1; e > 0; e--) {
      const end = boundaries[e];
      for (let s = e - 1; s >= 0; s--) {
        const rows = tryParse(window.subarray(boundaries[s] - base, end - base));
        if (rows === null) {
          continue;
        }
        const [row] = rows;
        if (rows.length === 1 && isDataRow(row)) {
          return { id: parseInt(row[ID_INDEX], 10), end };
        }
        if (rows.length > 1) {
          break;
        }
      }
    }

    if (base === headerSize - 1) {
      return null;
    }
    windowBytes *= 2;
  }
}

/**
 * Check the header, cut off an interrupted trailing row and read the id of
 * the last data row. Only the first line and the tail of the file are read.
 */
function locateResumePoint(filePath: string, size: number): ResumePoint {
  const fd = fs.openSync(filePath, "r+");

  try {
    const head = readRange(fd, 0, Math.min(size, Math.max(TAIL_CHUNK_BYTES, HEADER_LINE.length)));
    const firstNewline = head.indexOf(NEWLINE);

    if (firstNewline === -1 && HEADER_LINE.subarray(0, head.length).equals(head)) {
      fs.ftruncateSync(fd, 0);
      logger.warn(`${filePath} held no complete row; starting it over`);
      return { completeSize: 0, cursor: null };
    }
    if (!head.subarray(0, firstNewline + 1).equals(HEADER_LINE)) {
      throw new MalformedOutputError(`${filePath} does not start with the expected header row`, filePath);
    }

    const last = findLastRow(fd, size, HEADER_LINE.length);
    const completeSize = last?.end ?? HEADER_LINE.length;

    if (completeSize < size) {
      const fragment = readRange(fd, completeSize, size);
      if (!isCutOff(fragment)) {
        throw describeBadRow(filePath, fragment);
      }
      fs.ftruncateSync(fd, completeSize);
      logger.warn(`Dropped ${size - completeSize} bytes of an incomplete trailing row from ${filePath}`);
    }

    return { completeSize, cursor: last?.id ?? null };
  } finally {
    fs.closeSync(fd);
  }
}

/**
 * Append-only CSV file of repository rows that knows where the last run stopped
 */
export class ResumableCsvSink implements RepositorySink {
  private fd: number | null;
  private lastId: number | null;
  private count = 0;

  private constructor(
    readonly filePath: string,
    fd: number,
    cursor: number | null,
    private readonly fsync: boolean
  ) {
    this.fd = fd;
    this.lastId = cursor;
  }

  /**
   * Open `filePath` for appending: write the header on a fresh file,
   * otherwise pick up the cursor from its last row
   */
  static async open(filePath: string, options: SinkOptions = {}): Promise<ResumableCsvSink> {
    const size = fs.existsSync(filePath) ? fs.statSync(filePath).size : 0;
    const { completeSize, cursor } = size > 0
      ? locateResumePoint(filePath, size)
      : { completeSize: 0, cursor: null };

    const sink = new ResumableCsvSink(
      filePath,
      fs.openSync(filePath, "a"),
      cursor,
      options.fsync ?? false
    );

    if (completeSize === 0) {
      sink.writeLine(REPOSITORY_COLUMNS);
      logger.info(`Created ${filePath}`);
    } else if (cursor === null) {
      logger.info(`${filePath} has a header but no rows yet`);
    } else {
      logger.info(`Resuming ${filePath} after repository ${cursor}`);
    }

    return sink;
  }

  get cursor(): number | null {
    return this.lastId;
  }

  get written(): number {
    return this.count;
  }

  append(record: RepositoryRecord): void {
    this.writeLine(toRow(record));
    this.lastId = record.id;
    this.count++;
  }

  close(): void {
    if (this.fd !== null) {
      fs.closeSync(this.fd);
      this.fd = null;
    }
  }

  private writeLine(cells: readonly string[]): void {
    if (this.fd === null) {
      throw new Error(`Output file ${this.filePath} is already closed`);
    }

    const line = Buffer.from(stringify([Array.from(cells)]), "utf-8");
    let offset = 0;
    while (offset < line.length) {
      offset += fs.writeSync(this.fd, line, offset);
    }

    if (this.fsync) {
      fs.fsyncSync(this.fd);
    }
  }
}
