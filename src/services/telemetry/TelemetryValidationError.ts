export class TelemetryValidationError extends Error {
  public readonly statusCode: number;

  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], statusCode: number = 400) {
    super(message);
    this.name = 'TelemetryValidationError';
    this.statusCode = statusCode;
    this.issues = issues;
    Object.setPrototypeOf(this, TelemetryValidationError.prototype);
  }
}
