/** Sink for stage diagnostics. Stages default to `console`; tests pass a spy. */
export type StageLogger = Pick<Console, "log" | "warn">;

export const silentLogger: StageLogger = {
  log: () => undefined,
  warn: () => undefined,
};
