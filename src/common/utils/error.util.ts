export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const errorStack = (error: unknown): string | undefined =>
  error instanceof Error ? error.stack : undefined;
