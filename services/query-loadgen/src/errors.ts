export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const details = issues.map((issue) => `  - ${issue}`).join('\n');
    super(details ? `${message}\n${details}` : message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
