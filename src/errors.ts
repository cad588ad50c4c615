export class UnspeakableTextError extends Error {
  constructor(message = "text is empty") {
    super(message);
    this.name = "UnspeakableTextError";
  }
}

export class PlayerMissingError extends Error {
  constructor(message = "No audio player found. Install ffmpeg (ffplay) or mpg123, or ensure one is in PATH.") {
    super(message);
    this.name = "PlayerMissingError";
  }
}

export class CommandFailedError extends Error {
  constructor(
    readonly bin: string,
    readonly exitCode: number | null,
    readonly stderr: string
  ) {
    super(`${bin} failed (${exitCode ?? "signal"})${stderr.trim() ? `: ${stderr.trim()}` : ""}`);
    this.name = "CommandFailedError";
  }
}

export class CommandTimeoutError extends Error {
  constructor(
    readonly bin: string,
    readonly timeoutMs: number
  ) {
    super(`${bin} timed out after ${timeoutMs}ms`);
    this.name = "CommandTimeoutError";
  }
}

const CONTENT_FAILURE_MARKERS = ["no text to send", "no speakable text", "text is empty"];

// Content failures never succeed on retry; the alert is acknowledged anyway.
export function isContentFailure(error: unknown): boolean {
  if (error instanceof UnspeakableTextError) {
    return true;
  }
  const message = (error instanceof Error ? error.message : String(error)).toLowerCase();
  return CONTENT_FAILURE_MARKERS.some((marker) => message.includes(marker));
}

export function isMissingBinary(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
