import { ExerciseType } from "../common/common-enum";
import {
  UnassignedIdentifierError,
  UnsupportedExerciseTypeError,
} from "../common/errors";
import { ExerciseRecord } from "../types/model/exercise.model";
import type { CreateExerciseRequest } from "../types/request/createExerciseRequest";
import type {
  CreateExerciseResponse,
  GetExerciseResponse,
} from "../types/response/exercise.response";
import { logger } from "./logger";

// Storage codes; must stay stable once rows exist.
const exerciseTypeCodes: Record<ExerciseType, number> = {
  [ExerciseType.BARBELL]: 0,
  [ExerciseType.KETTLEBELL]: 1,
};

const exerciseTypeAliases: Record<string, ExerciseType> = {
  barbell: ExerciseType.BARBELL,
  bb: ExerciseType.BARBELL,
  kettlebell: ExerciseType.KETTLEBELL,
  kb: ExerciseType.KETTLEBELL,
};

export function exerciseTypeToCode(exerciseType: ExerciseType): number {
  return exerciseTypeCodes[exerciseType];
}

export function exerciseTypeFromCode(code: number): ExerciseType {
  const match = Object.values(ExerciseType).find(
    (type) => exerciseTypeCodes[type] === code
  );
  if (match === undefined) {
    logger.debug(`rejected exercise type code ${code}`);
    throw new UnsupportedExerciseTypeError(code);
  }
  return match;
}

export function parseExerciseType(value: string): ExerciseType {
  const lower = value.toLowerCase();
  if (!Object.prototype.hasOwnProperty.call(exerciseTypeAliases, lower)) {
    logger.debug(`rejected exercise type "${value}"`);
    throw new UnsupportedExerciseTypeError(value);
  }
  return exerciseTypeAliases[lower];
}

export function isExerciseTypeName(value: string): boolean {
  return Object.prototype.hasOwnProperty.call(
    exerciseTypeAliases,
    value.toLowerCase()
  );
}

export function toExerciseRecord(request: CreateExerciseRequest): ExerciseRecord {
  return ExerciseRecord.create(
    request.name,
    parseExerciseType(request.exerciseType),
    request.description ?? ""
  );
}

const requireIdentifier = (record: ExerciseRecord): number => {
  const id = record.getIdentifier();
  if (id === undefined) {
    throw new UnassignedIdentifierError(record.getName());
  }
  return id;
};

export function toCreateExerciseResponse(
  record: ExerciseRecord
): CreateExerciseResponse {
  return { id: requireIdentifier(record) };
}

export function toGetExerciseResponse(record: ExerciseRecord): GetExerciseResponse {
  const response: GetExerciseResponse = {
    id: requireIdentifier(record),
    name: record.getName(),
    exerciseType: record.getExerciseType(),
  };
  const description = record.getDescription();
  if (description !== "") {
    response.description = description;
  }
  return response;
}
