export class ConfigurationError extends Error {
  issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export class ReportWriteError extends Error {
  path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to write results to ${path}: ${reason}`, { cause });
    this.name = 'ReportWriteError';
    this.path = path;
  }
}
