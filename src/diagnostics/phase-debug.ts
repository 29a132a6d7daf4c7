// Minimal debug logging for the semantic and lowering passes.
// Enable with UCC_DEBUG_PHASES=1
import { flagEnabled } from "../lib/helpers.js";

const DEBUG = flagEnabled(process.env.UCC_DEBUG_PHASES);

let depth = 0;

export const pushPhase = (label: string) => {
  if (DEBUG) {
    // eslint-disable-next-line no-console
    console.log(`${" ".repeat(depth * 2)}[phase] ${label}`);
  }
  depth += 1;
};

export const popPhase = (label: string, diagnosticCount: number) => {
  depth = Math.max(0, depth - 1);
  if (!DEBUG) return;
  // eslint-disable-next-line no-console
  console.log(
    `${" ".repeat(depth * 2)}[phase] ${label} done (${diagnosticCount} diagnostic(s))`
  );
};

export const logPhase = (msg: string) => {
  if (!DEBUG) return;
  // eslint-disable-next-line no-console
  console.log(`${" ".repeat(depth * 2)}[phase] ${msg}`);
};
