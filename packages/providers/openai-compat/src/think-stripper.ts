// ThinkStripper: removes inline <think>…</think> reasoning from streamed text.
//
// Local reasoning models served through Ollama or llama.cpp often inline
// their chain of thought. Left in, it would be mistaken for the answer (or for
// a tool-call JSON line), so it is dropped before the oracle sees the text.

export class ThinkStripper {
  private readonly open: string;
  private readonly close: string;
  private inside = false;
  private pending = "";

  constructor(tag = "think") {
    this.open = `<${tag}>`;
    this.close = `</${tag}>`;
  }

  /** Feed one streamed piece; returns the text that is safe to emit now. */
  feed(text: string): string {
    this.pending += text;
    let visible = "";

    for (;;) {
      const marker = this.inside ? this.close : this.open;
      const at = this.pending.indexOf(marker);

      if (at === -1) {
        // Hold back a suffix that could be the start of the marker.
        const keep = partialSuffix(this.pending, marker);
        if (!this.inside) visible += this.pending.slice(0, this.pending.length - keep);
        this.pending = this.pending.slice(this.pending.length - keep);
        return visible;
      }

      if (!this.inside) visible += this.pending.slice(0, at);
      this.pending = this.pending.slice(at + marker.length);
      this.inside = !this.inside;
    }
  }

  /** End of stream: emit held-back text unless it belongs to an unclosed block. */
  flush(): string {
    const rest = this.inside ? "" : this.pending;
    this.pending = "";
    this.inside = false;
    return rest;
  }
}

function partialSuffix(text: string, marker: string): number {
  for (let n = Math.min(marker.length - 1, text.length); n > 0; n--) {
    if (marker.startsWith(text.slice(-n))) return n;
  }
  return 0;
}
