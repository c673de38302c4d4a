export { ok, fatal, line, errorLine, truncate, envelope, errorEnvelope, BIN, MAX_LIST_ITEMS } from "./output.ts";
export type { NextAction, FatalOptions } from "./output.ts";
export {
  formatTask,
  formatProject,
  formatWorkspace,
  formatUser,
  formatWebhook,
} from "./format.ts";
export type { FormattedTask, FormattedProject, FormattedWebhook } from "./format.ts";
