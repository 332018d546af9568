export interface CreateExerciseResponse {
  id: number;
}

export interface GetExerciseResponse {
  id: number;
  name: string;
  description?: string;
  exerciseType: string;
}
