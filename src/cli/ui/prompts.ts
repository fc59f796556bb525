/**
 * Interactive prompts wrapper
 */

import * as p from "@clack/prompts";

export const confirm = p.confirm;
export const select = p.select;
export const text = p.text;
export const multiselect = p.multiselect;
export const isCancel = p.isCancel;

/**
 * Yes/no prompt where cancelling (Ctrl+C) counts as "no"
 */
export async function confirmOrCancel(message: string): Promise<boolean> {
  const answer = await p.confirm({ message, initialValue: false });
  return !p.isCancel(answer) && answer;
}
