export class ConfigurationInvalidError extends Error {
  public readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`[governor] invalid configuration in ${source}: ${issues.join('; ')}`);
    this.name = 'ConfigurationInvalidError';
    this.issues = issues;
  }
}
