export class ExerciseError extends Error {
  public status: number;

  constructor(message: string, status = 500) {
    super(message);
    this.name = new.target.name;
    this.status = status;
  }
}

export class UnsupportedExerciseTypeError extends ExerciseError {
  public value: string | number;

  constructor(value: string | number) {
    super(`unsupported exercise type: ${value}`, 400);
    this.value = value;
  }
}

export class ValidationError extends ExerciseError {
  constructor(message: string) {
    super(message, 400);
  }
}

// Raised when a response needs an id the exercise was never assigned.
export class UnassignedIdentifierError extends ExerciseError {
  constructor(name: string) {
    super(`exercise "${name}" has no identifier assigned`, 500);
  }
}
