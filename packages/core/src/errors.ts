export class HistoryStructureError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "HistoryStructureError";
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
