/**
 * CLI UI module exports
 */

export type { SummaryItem } from "./formatters";
// Formatters
export { formatCheck, formatList, formatSummary } from "./formatters";
// Output
export {
  banner,
  error,
  intro,
  message,
  note,
  outro,
  PROGRAM,
  VERSION,
  warn,
} from "./output";
// Prompts
export { confirm, isCancel, select, text } from "./prompts";

import * as output from "./output";
import * as prompts from "./prompts";

export const ui = {
  banner: output.banner,
  intro: output.intro,
  outro: output.outro,
  note: output.note,
  warn: output.warn,
  error: output.error,
  message: output.message,
  confirm: prompts.confirm,
  select: prompts.select,
  text: prompts.text,
  isCancel: prompts.isCancel,
};
