export interface CreateExerciseRequest {
  name: string;
  description?: string;
  exerciseType: string; // barbell | bb | kettlebell | kb, any case
}
