export type OutputFormat = "human" | "jsonl";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
  details?: Record<string, unknown>;
};

export function diag(
  level: Diagnostic["level"],
  code: string,
  message: string,
  extra?: Pick<Diagnostic, "path" | "details">,
): Diagnostic {
  return { level, code, message, ...extra };
}

type Sink = { write: (chunk: string) => unknown };

/**
 * Prints diagnostics as human text or one JSON record per line.
 * Human-format errors go to stderr; everything else to stdout.
 */
export class Reporter {
  constructor(
    readonly format: OutputFormat,
    private readonly out: Sink = process.stdout,
    private readonly err: Sink = process.stderr,
  ) {}

  emit(d: Diagnostic): void {
    if (this.format === "jsonl") {
      this.out.write(JSON.stringify(d) + "\n");
    } else if (d.level === "error") {
      this.err.write(d.message + "\n");
    } else {
      this.out.write(d.message + "\n");
    }
  }

  info(code: string, message: string, extra?: Pick<Diagnostic, "path" | "details">): void {
    this.emit(diag("info", code, message, extra));
  }

  error(code: string, message: string, extra?: Pick<Diagnostic, "path" | "details">): void {
    this.emit(diag("error", code, message, extra));
  }

  /** Structured record in jsonl mode, pre-rendered lines in human mode. */
  record(data: Record<string, unknown>, human: string): void {
    this.out.write((this.format === "jsonl" ? JSON.stringify(data) : human) + "\n");
  }
}
