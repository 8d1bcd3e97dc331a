/** The slice of `console` the pipeline writes through. */
export type Logger = Pick<Console, "log" | "warn" | "error">;

export function logLines(logger: Logger, prefix: string, chunk: string): void {
  for (const line of chunk.split(/\r?\n/)) {
    if (line.length === 0) continue;
    logger.log(`${prefix} ${line}`);
  }
}

/** Logs streamed text line by line, holding back a line until its newline arrives. */
export class LineEcho {
  private pending = "";

  constructor(
    private readonly logger: Logger,
    private readonly prefix: string
  ) {}

  write(chunk: string): void {
    const text = this.pending + chunk;
    const cut = text.lastIndexOf("\n");
    if (cut < 0) {
      this.pending = text;
      return;
    }
    this.pending = text.slice(cut + 1);
    logLines(this.logger, this.prefix, text.slice(0, cut));
  }

  flush(): void {
    logLines(this.logger, this.prefix, this.pending);
    this.pending = "";
  }
}
