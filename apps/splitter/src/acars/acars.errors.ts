export class AcarsInputError extends Error {
  constructor(
    message: string,
    readonly path: string,
  ) {
    super(message);
    this.name = 'AcarsInputError';
  }
}

export class AcarsConfigError extends Error {
  constructor(
    message: string,
    readonly path: string | null = null,
  ) {
    super(message);
    this.name = 'AcarsConfigError';
  }
}
