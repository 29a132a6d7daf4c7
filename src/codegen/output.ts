import type { OutputSink } from "../semantics/phase-context.js";

/** Collects generated text in memory */
export class StringOutput implements OutputSink {
  #chunks: string[] = [];

  write(text: string): void {
    this.#chunks.push(text);
  }

  toString(): string {
    return this.#chunks.join("");
  }
}
