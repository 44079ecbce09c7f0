export class EmptyInputError extends Error {
  readonly code = 'empty_input' as const;

  constructor(message = 'No text provided') {
    super(message);
    this.name = 'EmptyInputError';
  }
}

export class MalformedRecordError extends Error {
  readonly code = 'malformed_record' as const;

  constructor(
    message: string,
    readonly rowNumber: number,
  ) {
    super(message);
    this.name = 'MalformedRecordError';
  }
}
