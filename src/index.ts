export { ExerciseType, LogLevel } from "./common/common-enum";
export {
  ExerciseError,
  UnassignedIdentifierError,
  UnsupportedExerciseTypeError,
  ValidationError,
} from "./common/errors";
export type { AppConfig } from "./configs/environment";
export { buildConfig, loadConfig, validateConfig } from "./configs/environment";
export { ExerciseRecord } from "./types/model/exercise.model";
export type { CreateExerciseRequest } from "./types/request/createExerciseRequest";
export type {
  CreateExerciseResponse,
  GetExerciseResponse,
} from "./types/response/exercise.response";
export {
  exerciseTypeFromCode,
  exerciseTypeToCode,
  isExerciseTypeName,
  parseExerciseType,
  toCreateExerciseResponse,
  toExerciseRecord,
  toGetExerciseResponse,
} from "./utils/convert";
export type { Logger, LoggerOptions } from "./utils/logger";
export { createLogger, logger } from "./utils/logger";
export {
  createExerciseRequestSchema,
  getExerciseResponseSchema,
  parseCreateExerciseRequest,
} from "./validators/exercise.validator";
