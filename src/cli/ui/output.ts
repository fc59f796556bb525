/**
 * Styled output helpers
 */

import { readFileSync } from "node:fs";
import * as path from "node:path";
import * as p from "@clack/prompts";
import color from "picocolors";

export { color };

export const APP_NAME = "volume-keeper";

function readVersion(): string {
  // same relative location from src/cli/ui and dist/cli/ui
  const raw: unknown = JSON.parse(readFileSync(path.join(__dirname, "../../../package.json"), "utf-8"));
  if (typeof raw === "object" && raw !== null) {
    const version: unknown = Reflect.get(raw, "version");
    if (typeof version === "string") return version;
  }
  return "0.0.0";
}

export const VERSION = readVersion();

/**
 * Intro line with name, version and the running mode
 */
export function banner(mode: string): void {
  p.intro(`${color.cyan(APP_NAME)} ${color.dim(`v${VERSION}`)} ${color.dim("·")} ${color.white(mode)}`);
}

export const intro = (title: string) => p.intro(color.bgCyan(color.black(` ${title} `)));
export const outro = (message: string) => p.outro(color.green(message));
export const cancel = (message: string) => p.cancel(message);
export const note = (message: string, title?: string) => p.note(message, title);

export const info = (message: string) => p.log.info(message);
export const success = (message: string) => p.log.success(message);
export const warn = (message: string) => p.log.warn(message);
export const error = (message: string) => p.log.error(message);
export const step = (message: string) => p.log.step(message);
export const message = (message: string) => p.log.message(message);

export const spinner = p.spinner;
