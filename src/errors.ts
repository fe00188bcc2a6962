// ─── Fatal Errors ────────────────────────────────────────────────────────────
//
// Conditions that stop the pipeline before any artifact is written.
// Everything recoverable is reported as a Diagnostic instead.
// ─────────────────────────────────────────────────────────────────────────────

/** Malformed source file, config file, selector, divisor, or command line. */
export class ParseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ParseError";
  }
}

/** A selection names a (track, channel) the source file does not contain. */
export class SelectionError extends Error {
  readonly track: number;
  readonly channel: number;

  constructor(track: number, channel: number) {
    super(`no part at track ${track} channel ${channel}`);
    this.name = "SelectionError";
    this.track = track;
    this.channel = channel;
  }
}
