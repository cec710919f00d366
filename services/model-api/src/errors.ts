export class DecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DecodeError";
  }
}

export class ModelError extends Error {
  public readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = "ModelError";
    this.status = status;
  }
}

/** The engine can no longer serve inferences at all (e.g. device lost). */
export class FatalModelError extends ModelError {
  constructor(message: string, status?: number) {
    super(message, status);
    this.name = "FatalModelError";
  }
}
