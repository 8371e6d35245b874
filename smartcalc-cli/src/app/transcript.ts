import type { TranscriptEntry } from "./types.js";

export type DisplayLine = {
  readonly text: string;
  readonly color?: "green" | "cyan" | "red" | "yellow";
  readonly bold?: boolean;
};

const PROMPT = "> ";

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

function chunk(text: string, width: number): string[] {
  const pieces: string[] = [];
  for (let index = 0; index < text.length; index += width) {
    pieces.push(text.slice(index, index + width));
  }
  return pieces;
}

/** Hard-wraps each line of `content` at `width` columns; expressions are not word-wrapped. */
export function wrapContent(content: string, width: number): string[] {
  const safeWidth = Math.max(1, width);
  const wrapped: string[] = [];

  for (const rawLine of content.split(/\r?\n/)) {
    if (rawLine.length === 0) {
      wrapped.push("");
      continue;
    }
    wrapped.push(...chunk(rawLine, safeWidth));
  }

  return wrapped;
}

function styleFor(kind: TranscriptEntry["kind"]): Pick<DisplayLine, "color" | "bold"> {
  switch (kind) {
    case "input":
      return { color: "green" };
    case "result":
      return { color: "cyan", bold: true };
    case "error":
      return { color: "red" };
    case "info":
      return { color: "yellow" };
  }
}

export function toDisplayLines(entries: readonly TranscriptEntry[], width: number): DisplayLine[] {
  const contentWidth = Math.max(1, width);
  const lines: DisplayLine[] = [];

  for (const entry of entries) {
    const text = entry.kind === "input" ? `${PROMPT}${entry.content}` : entry.content;
    const style = styleFor(entry.kind);
    for (const line of wrapContent(text, contentWidth)) {
      lines.push({ text: line, ...style });
    }
  }

  return lines;
}
