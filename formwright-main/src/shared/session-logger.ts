/**
 * Dedicated session debug logger.
 *
 * Every line prints a bright green [SESSION] prefix so you can filter with:
 *   grep "\[SESSION\]"
 *
 * Categories:
 *   STATE   — automaton state commits, completion
 *   INTENT  — every intent applied (update / noop)
 *   PROMPT  — prompts sent to the model
 *   MODEL   — raw model answers and selection outcomes
 */

import { isDebugEnabled } from "./debug-log.js";

const R = "\x1b[0m";
const GREEN = "\x1b[32m";
const DIM = "\x1b[2m";
const BOLD = "\x1b[1m";
const CYAN = "\x1b[36m";
const YELLOW = "\x1b[33m";
const MAGENTA = "\x1b[35m";
const WHITE = "\x1b[37m";

type Category = "STATE" | "INTENT" | "PROMPT" | "MODEL";

const CATEGORY_COLORS: Record<Category, string> = {
  STATE: MAGENTA,
  INTENT: CYAN,
  PROMPT: YELLOW,
  MODEL: WHITE,
};

function ts(): string {
  return new Date().toISOString().slice(11, 23); // HH:MM:SS.mmm
}

function sessionLog(category: Category, message: string, detail?: Record<string, unknown>): void {
  if (!isDebugEnabled()) return;

  const color = CATEGORY_COLORS[category];
  const prefix = `${GREEN}${BOLD}[SESSION]${R}`;
  const cat = `${color}${category.padEnd(6)}${R}`;
  const time = `${DIM}${ts()}${R}`;

  if (detail) {
    const parts = Object.entries(detail)
      .map(([k, v]) => `${DIM}${k}=${R}${formatValue(v)}`)
      .join(" ");
    console.log(`${prefix} ${time} ${cat} ${message}  ${parts}`);
  } else {
    console.log(`${prefix} ${time} ${cat} ${message}`);
  }
}

function formatValue(v: unknown): string {
  if (v === null || v === undefined) return `${DIM}null${R}`;
  if (typeof v === "string") {
    if (v.length > 80) return `"${v.slice(0, 77)}..."`;
    return `"${v}"`;
  }
  if (typeof v === "number" || typeof v === "boolean") return String(v);
  return JSON.stringify(v);
}

// ── Public API ─────────────────────────────────────────────

export function logStateCommit(locationId: string, historySize: number, fields: number): void {
  sessionLog("STATE", "✓ State COMMITTED", { locationId, history: historySize, fields });
}

export function logSessionComplete(rootId: string): void {
  sessionLog("STATE", "★ Session COMPLETE", { rootId });
}

export function logIntent(kind: string, locationId: string): void {
  sessionLog("INTENT", `+ ${kind}`, { locationId });
}

export function logPrompt(elementId: string, prompt: string, allowed: string[]): void {
  sessionLog("PROMPT", "→ Prompt SENT", { elementId, chars: prompt.length, allowed });
}

export function logModelAnswer(elementId: string, raw: string): void {
  sessionLog("MODEL", "← Answer RECEIVED", { elementId, raw });
}

export function logSelection(elementId: string, selected: string | null, via: string): void {
  sessionLog("MODEL", selected ? "✓ Option RESOLVED" : "✗ No option resolved", { elementId, selected, via });
}

export function logModelFailure(elementId: string, error: string): void {
  sessionLog("MODEL", "⚠ Model call FAILED", { elementId, error });
}
