import * as tasks from "./tasks.ts";
import * as projects from "./projects.ts";
import * as workspaces from "./workspaces.ts";
import * as users from "./users.ts";
import * as webhooks from "./webhooks.ts";
import * as events from "./events.ts";
import * as filter from "./filter.ts";

export { tasks, projects, workspaces, users, webhooks, events, filter };

export type { AsanaClient, ClientConfig, ResolvedWorkspace, WorkspaceSource } from "./client.ts";
export { createClient, createClientFromEnv } from "./client.ts";
export type { EnvConfig, LogLevel } from "./config.ts";
export { loadEnvConfig, parseDuration } from "./config.ts";
export type { SdkErrorCode } from "./errors.ts";
export { SdkError, SyncExpiredError, isSdkError } from "./errors.ts";
export type { FetchPageResult, SyncResult, DrainResult, PollSignal, PollOptions, PollChannels } from "./events.ts";
export type { FilterEvaluator } from "./filter.ts";
export { parallel } from "./parallel.ts";
export type * from "./types.ts";
