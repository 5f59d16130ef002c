export class UnsupportedPlatformError extends Error {
  constructor(
    message: string,
    public readonly platform: string
  ) {
    super(message);
    this.name = 'UnsupportedPlatformError';
  }
}

export class UnsupportedProviderError extends Error {
  constructor(
    message: string,
    public readonly provider: string
  ) {
    super(message);
    this.name = 'UnsupportedProviderError';
  }
}

export class CommandExecutionError extends Error {
  constructor(
    message: string,
    public readonly command: string,
    /** `null` when the child was stopped before reporting a status. */
    public readonly exitCode: number | null,
    public readonly stderr: string,
    public readonly stdout: string = ''
  ) {
    super(message);
    this.name = 'CommandExecutionError';
  }
}

export class CommandTimeoutError extends Error {
  constructor(
    message: string,
    public readonly command: string,
    public readonly timeoutSeconds: number
  ) {
    super(message);
    this.name = 'CommandTimeoutError';
  }
}

export class InvalidUserError extends Error {
  constructor(
    message: string,
    public readonly username: string | null,
    public readonly uid: number | null
  ) {
    super(message);
    this.name = 'InvalidUserError';
  }
}

/**
 * Flattens any thrown value into a single printable line for log records.
 * Stack traces are only included when `withStack` is set.
 */
export function describeError(error: unknown, withStack = false): string {
  if (error instanceof Error) {
    const head = `${error.name}: ${error.message}`;
    if (!withStack || !error.stack) return head;
    // The stack's own header is dropped: subclasses set their name after it is captured
    const frames = error.stack.split('\n').filter((line) => /^\s+at /.test(line));
    return [head, ...frames].join('\n');
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object') {
    try {
      return JSON.stringify(error);
    } catch {
      return String(error);
    }
  }
  return 'Unknown error';
}
