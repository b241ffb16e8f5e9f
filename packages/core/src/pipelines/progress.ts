/**
 * Where pipelines report what they are doing. The CLI prints to the console
 * or drives the Ink views; library callers and tests take SilentProgress.
 * Warnings that matter to the result are also returned in it, so dropping
 * them here loses nothing.
 */
export interface ProgressReporter {
  section(title: string): void;
  start(message: string): void;
  succeed(message: string): void;
  fail(message: string): void;
  warn(message: string): void;
  info(message: string): void;
}

const ignore = (_message: string): void => undefined;

export class SilentProgress implements ProgressReporter {
  readonly section = ignore;
  readonly start = ignore;
  readonly succeed = ignore;
  readonly fail = ignore;
  readonly warn = ignore;
  readonly info = ignore;
}
