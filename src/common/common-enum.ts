export enum ExerciseType {
  BARBELL = "BARBELL",
  KETTLEBELL = "KETTLEBELL",
}

export enum LogLevel {
  ERROR = "error",
  WARN = "warn",
  INFO = "info",
  DEBUG = "debug",
}
