export class InvalidUrlError extends Error {
  readonly url: string;

  constructor(url: string) {
    super(`Invalid URL format: ${url}`);
    this.name = 'InvalidUrlError';
    this.url = url;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
