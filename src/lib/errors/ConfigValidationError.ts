import { AppError } from './AppError';

/** One offending environment variable and what is wrong with it. */
export interface ConfigIssue {
  readonly variable: string;
  readonly messages: readonly string[];
}

export class ConfigValidationError extends AppError {
  public readonly issues: readonly ConfigIssue[];

  constructor(issues: readonly ConfigIssue[]) {
    super(
      `Invalid configuration: ${issues
        .map((i) => `${i.variable} (${i.messages.join('; ')})`)
        .join(', ')}`,
      'CONFIG_INVALID',
    );
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }

  /** Names of the offending variables, in reporting order. */
  public get variables(): string[] {
    return this.issues.map((i) => i.variable);
  }
}
