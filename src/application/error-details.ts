export interface ErrorDetails {
  details: string;
  stacktrace: string[] | null;
  file: string | null;
  line: number | null;
  source: string | null;
}

// "    at fn (/path/file.js:10:5)" or "    at /path/file.js:10:5"
const FRAME_PATTERN = /^\s*at (?:(.+?) \()?(.+?):(\d+):\d+\)?$/;

/**
 * Extracts message, stack lines and the location of the innermost V8
 * stack frame from a thrown value.
 */
export function describeError(err: unknown): ErrorDetails {
  if (!(err instanceof Error)) {
    return { details: String(err), stacktrace: null, file: null, line: null, source: null };
  }

  const stacktrace = err.stack
    ? err.stack.split('\n').map((l) => l.trimEnd()).filter((l) => l.length > 0)
    : null;

  const frame = stacktrace
    ?.map((l) => FRAME_PATTERN.exec(l))
    .find((m): m is RegExpExecArray => m !== null);

  const lineText = frame?.[3];

  return {
    details: `${err.name}: ${err.message}`,
    stacktrace,
    file: frame?.[2] ?? null,
    line: lineText !== undefined ? Number(lineText) : null,
    source: frame?.[1] ?? null,
  };
}
