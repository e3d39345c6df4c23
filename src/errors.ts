export class AccessError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.code = code;
    this.name = this.constructor.name;
  }
}

export function isAccessError(value: unknown): value is AccessError {
  return value instanceof AccessError;
}

/** A leaf received a value of another kind, or a field holds the wrong native. */
export class TypeMismatchError extends AccessError {
  readonly expected: string;
  readonly found: string;

  constructor(expected: string, found: string) {
    super("TYPE_ERROR", `Type mismatch: expected ${expected}, found ${found}`);
    this.expected = expected;
    this.found = found;
  }
}

export class TooManyKeysError extends AccessError {
  readonly elementsRemaining: number;

  constructor(elementsRemaining: number) {
    super(
      "TOO_MANY_KEYS",
      `Too many keys: ${elementsRemaining} element${elementsRemaining === 1 ? "" : "s"} remaining past a leaf`,
    );
    this.elementsRemaining = elementsRemaining;
  }
}

export class UnknownFieldError extends AccessError {
  readonly field: string;
  readonly validFields: readonly string[];

  constructor(field: string, validFields: readonly string[]) {
    super(
      "UNKNOWN_FIELD",
      `Unknown field ${JSON.stringify(field)}, expected one of: ${validFields.join(", ")}`,
    );
    this.field = field;
    this.validFields = validFields;
  }
}

/** An aggregate was asked for its own value; `Value` has no structured variant. */
export class CantSerializeError extends AccessError {
  readonly typeName: string;

  constructor(typeName: string) {
    super("CANT_SERIALIZE", `Can't serialize ${typeName} as a value`);
    this.typeName = typeName;
  }
}

export class ValidationError extends AccessError {
  readonly issues: ReadonlyArray<{
    message: string;
    path?: ReadonlyArray<PropertyKey>;
  }>;

  constructor(
    issues: ReadonlyArray<{
      message: string;
      path?: ReadonlyArray<PropertyKey>;
    }>,
  ) {
    super(
      "VALIDATION_ERROR",
      `Validation failed: ${issues.map((i) => i.message).join(", ")}`,
    );
    this.issues = issues;
  }
}
