import type { TraceMetadata } from "@social-media-tools/types/global";

export class Metadata implements TraceMetadata {
  constructor(
    readonly user: string,
    readonly source: string,
    readonly timestamp: string
  ) {}

  /**
   * Returns the stack frame of the code calling this method, e.g.
   * `at convertFacebookCommentsToTracedData (/app/src/utils/mappers.ts:42:7)`.
   */
  static getCallLocation(): string {
    const frames = (new Error().stack ?? "")
      .split("\n")
      .slice(1)
      .map((line) => line.trim());
    // frames[0] is this method, frames[1] the code that wants its location recorded
    return frames[1] ?? "unknown";
  }

  toJSON(): TraceMetadata {
    return { user: this.user, source: this.source, timestamp: this.timestamp };
  }
}
