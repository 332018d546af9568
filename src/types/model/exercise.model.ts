import { ExerciseType } from "../../common/common-enum";

/**
 * One exercise definition. Frozen once created.
 *
 * An identifier of `0` means the exercise has not been assigned one yet
 * (e.g. it was never stored). A real identifier of `0` therefore reads back
 * as unassigned too. Identifiers are not checked for being integers: any
 * value other than `0`, `NaN` included, is kept as assigned.
 */
export class ExerciseRecord {
  private readonly id: number | null;
  private readonly name: string;
  private readonly exerciseType: ExerciseType;
  private readonly description: string;

  private constructor(
    id: number,
    name: string,
    exerciseType: ExerciseType,
    description: string
  ) {
    this.id = id === 0 ? null : id;
    this.name = name;
    this.exerciseType = exerciseType;
    this.description = description;
    Object.freeze(this);
  }

  static create(name: string, exerciseType: ExerciseType): ExerciseRecord;
  static create(
    name: string,
    exerciseType: ExerciseType,
    description: string
  ): ExerciseRecord;
  static create(
    id: number,
    name: string,
    exerciseType: ExerciseType,
    description: string
  ): ExerciseRecord;
  static create(
    ...args:
      | [string, ExerciseType]
      | [string, ExerciseType, string]
      | [number, string, ExerciseType, string]
  ): ExerciseRecord {
    switch (args.length) {
      case 4:
        return new ExerciseRecord(...args);
      case 3:
        return new ExerciseRecord(0, ...args);
      default:
        return new ExerciseRecord(0, args[0], args[1], "");
    }
  }

  getIdentifier(): number | undefined {
    return this.id ?? undefined;
  }

  getName(): string {
    return this.name;
  }

  getDescription(): string {
    return this.description;
  }

  getExerciseType(): ExerciseType {
    return this.exerciseType;
  }
}
