export type UsbbwErrorKind =
  | "InvalidEndpoint"
  | "MalformedDevice"
  | "InvalidPath"
  | "ConfigCycle"
  | "ConfigParseError";

type ErrorContext = {
  file?: string;
  key?: string;
  path?: string;
  cause?: unknown;
};

export class UsbbwError extends Error {
  readonly kind: UsbbwErrorKind;
  readonly file?: string;
  readonly key?: string;
  readonly path?: string;

  constructor(kind: UsbbwErrorKind, message: string, ctx: ErrorContext = {}) {
    super(message, ctx.cause === undefined ? undefined : { cause: ctx.cause });
    this.name = kind;
    this.kind = kind;
    this.file = ctx.file;
    this.key = ctx.key;
    this.path = ctx.path;
  }
}

export function isUsbbwError(e: unknown, kind?: UsbbwErrorKind): e is UsbbwError {
  return e instanceof UsbbwError && (kind === undefined || e.kind === kind);
}

export function describeError(e: unknown): string {
  if (e instanceof UsbbwError) {
    const where = [e.file, e.key ? `key '${e.key}'` : undefined, e.path ? `device ${e.path}` : undefined]
      .filter((x): x is string => typeof x === "string" && x.length > 0)
      .join(", ");
    return where ? `${e.kind}: ${e.message} (${where})` : `${e.kind}: ${e.message}`;
  }
  if (e instanceof Error) return e.message;
  return String(e);
}
