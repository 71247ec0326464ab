/**
 * Output rendering helpers
 */

import type { EngineStats, MessageRecord } from "../core/types.js";

type Color = "red" | "green" | "white" | "bold";

const CODES: Record<Color, string> = {
  red: "\x1b[31m",
  green: "\x1b[32m",
  white: "\x1b[37m",
  bold: "\x1b[1m",
};
const RESET = "\x1b[0m";

export type Paint = (text: string, color: Color) => string;

export function painter(enabled: boolean): Paint {
  return (text, color) => (enabled ? `${CODES[color]}${text}${RESET}` : text);
}

/** One line per message: id, sender, subject, date. */
export function formatListing(records: Iterable<MessageRecord>, paint: Paint): string[] {
  const lines: string[] = [];
  for (const r of records) {
    lines.push([paint(String(r.id), "green"), paint(r.sender, "white"), paint(r.subject, "red"), paint(r.date, "white")].join("  "));
  }
  return lines;
}

/** Sender is implied by the query, so it is left out. */
export function formatSenderListing(records: Iterable<MessageRecord>, paint: Paint): string[] {
  const lines: string[] = [];
  for (const r of records) {
    lines.push([paint(String(r.id), "green"), r.subject, r.date].join("  "));
  }
  return lines;
}

export function formatMessage(record: MessageRecord, paint: Paint): string[] {
  return [
    `${paint("ID:", "green")} ${record.id}`,
    `${paint("From:", "green")} ${record.sender}`,
    `${paint("Subject:", "green")} ${paint(record.subject, "red")}`,
    `${paint("Date:", "green")} ${record.date}`,
    "",
    record.body,
  ];
}

export function formatStats(stats: EngineStats): string[] {
  return [
    `messages: ${stats.messages}`,
    `dates: ${stats.dates}`,
    `tree height: ${stats.treeHeight}`,
    `senders: ${stats.senders}`,
    `terms: ${stats.terms}`,
  ];
}
