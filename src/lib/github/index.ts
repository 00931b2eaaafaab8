export { GitHubRepositoryFeed } from "./repository-feed";
export type { RepositoryFeed, SessionInfo } from "../../types/github";
