/**
 * Summary and list formatters
 */

import color from "picocolors";

export interface SummaryItem {
  label: string;
  value: string | number | null | undefined;
}

export function formatSummary(items: SummaryItem[]): string {
  const visible = items.filter(
    (i) => i.value !== null && i.value !== undefined,
  );
  if (visible.length === 0) return "";

  const maxLabelLen = Math.max(...visible.map((i) => i.label.length));
  return visible
    .map((i) => `${color.dim(i.label.padEnd(maxLabelLen))}  ${i.value}`)
    .join("\n");
}

export function formatList(entries: string[], bullet: string = "•"): string {
  return entries.map((entry) => `${color.dim(bullet)} ${entry}`).join("\n");
}

export function formatCheck(ok: boolean, label: string): string {
  const mark = ok ? color.green("✔") : color.yellow("✖");
  return `${mark} ${label}`;
}
