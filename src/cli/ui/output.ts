/**
 * Styled output helpers
 */

import * as p from "@clack/prompts";
import color from "picocolors";
import pkg from "../../../package.json";

export const VERSION = pkg.version;
export const PROGRAM = "immich-keeper";

/**
 * Display the program name, version and current command
 */
export function banner(command: string): void {
  const version = color.dim(`v${VERSION}`);
  p.intro(
    `${color.cyan(PROGRAM)} ${version} ${color.dim("·")} ${color.white(command)}`,
  );
}

export const intro = (title: string) =>
  p.intro(color.bgCyan(color.black(` ${title} `)));
export const outro = (message: string) => p.outro(color.green(message));
export const note = (message: string, title?: string) => p.note(message, title);

export const warn = (message: string) => p.log.warn(message);
export const error = (message: string) => p.log.error(message);
export const message = (message: string) => p.log.message(message);
