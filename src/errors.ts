export class MpmError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MpmError";
  }
}

export class ValidationError extends MpmError {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends MpmError {
  constructor(message = "Database file not found") {
    super(message);
    this.name = "NotFoundError";
  }
}

export class AlreadyExistsError extends MpmError {
  constructor(message = "A database with that name already exists") {
    super(message);
    this.name = "AlreadyExistsError";
  }
}

export class InvalidPassphraseError extends MpmError {
  constructor(message = "Master password incorrect") {
    super(message);
    this.name = "InvalidPassphraseError";
  }
}

export class CorruptFileError extends MpmError {
  constructor(message: string) {
    super(message);
    this.name = "CorruptFileError";
  }
}

export class IndexNotFoundError extends MpmError {
  constructor(public readonly index: number) {
    super(`Could not remove item: Invalid index ${index}`);
    this.name = "IndexNotFoundError";
  }
}

export class InvalidLengthError extends MpmError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidLengthError";
  }
}

export class InvalidFieldError extends MpmError {
  constructor(public readonly field: string) {
    super(`${field} must be a non-empty string`);
    this.name = "InvalidFieldError";
  }
}

export class CryptoError extends MpmError {
  constructor(message: string) {
    super(message);
    this.name = "CryptoError";
  }
}

export class PersistenceError extends MpmError {
  constructor(message: string) {
    super(message);
    this.name = "PersistenceError";
  }
}
