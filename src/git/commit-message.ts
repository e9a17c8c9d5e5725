/**
 * Helpers that reproduce git's pretty-format placeholders for commit objects
 * read directly from the object store.
 */

import type { RevisionRange } from "./types.js";

export interface ParsedMessage {
  /** `%s`: first paragraph, lines joined by single spaces */
  subject: string;
  /** `%b`: everything after the first paragraph, trailing whitespace removed */
  body: string;
}

const isBlank = (line: string): boolean => line.trim() === "";

export function parseCommitMessage(message: string): ParsedMessage {
  const lines = message.split("\n");
  let i = 0;

  while (i < lines.length && isBlank(lines[i])) i++;

  const subjectLines: string[] = [];
  while (i < lines.length && !isBlank(lines[i])) {
    subjectLines.push(lines[i].trim());
    i++;
  }

  while (i < lines.length && isBlank(lines[i])) i++;

  return {
    subject: subjectLines.join(" "),
    body: lines.slice(i).join("\n").trimEnd(),
  };
}

/**
 * Render a unix timestamp the way `%ci` does: "YYYY-MM-DD HH:MM:SS +ZZZZ".
 * `timezoneOffset` uses isomorphic-git's convention (minutes, sign inverted,
 * same as Date#getTimezoneOffset).
 */
export function formatGitDate(timestamp: number, timezoneOffset: number): string {
  const offsetMinutes = -timezoneOffset;
  const local = new Date((timestamp + offsetMinutes * 60) * 1000);
  const pad = (n: number) => n.toString().padStart(2, "0");

  const sign = offsetMinutes >= 0 ? "+" : "-";
  const abs = Math.abs(offsetMinutes);
  const zone = `${sign}${pad(Math.floor(abs / 60))}${pad(abs % 60)}`;

  return (
    `${local.getUTCFullYear()}-${pad(local.getUTCMonth() + 1)}-${pad(local.getUTCDate())} ` +
    `${pad(local.getUTCHours())}:${pad(local.getUTCMinutes())}:${pad(local.getUTCSeconds())} ${zone}`
  );
}

/** `from..to`, or `from^..to` when inclusive */
export function formatRange(range: RevisionRange): string {
  return `${range.from}${range.inclusive ? "^" : ""}..${range.to}`;
}

export function splitLines(output: string): string[] {
  return output.split("\n").filter((line) => line.trim() !== "");
}
