function describeValue(value: unknown): string {
  if (typeof value === 'number') {
    return String(value);
  }
  return JSON.stringify(value) ?? String(value);
}

export class FieldParseError extends Error {
  public readonly field: string;

  constructor(field: string, value: unknown) {
    super(`invalid number ${describeValue(value)}`);
    this.name = 'FieldParseError';
    this.field = field;
  }
}

/**
 * A session client fetch for one category failed or returned something that
 * is not a list of records.
 */
export class CategoryFetchError extends Error {
  public readonly category: string;

  constructor(category: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to fetch ${category} sensors: ${reason}`, {cause});
    this.name = 'CategoryFetchError';
    this.category = category;
  }
}
