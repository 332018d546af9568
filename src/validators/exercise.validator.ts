import { z } from "zod";
import { ExerciseType } from "../common/common-enum";
import { ValidationError } from "../common/errors";
import type { CreateExerciseRequest } from "../types/request/createExerciseRequest";
import { isExerciseTypeName } from "../utils/convert";

export const createExerciseRequestSchema = z.object({
  name: z
    .string({ required_error: "name is required" })
    .min(1, "name is required"),
  description: z
    .string({ invalid_type_error: "description must be a string" })
    .optional(),
  exerciseType: z
    .string({ required_error: "exerciseType is required" })
    .refine(isExerciseTypeName, {
      message: "exerciseType must be one of barbell, bb, kettlebell, kb",
    }),
});

export const getExerciseResponseSchema = z.object({
  id: z
    .number()
    .int()
    .refine((id) => id !== 0, { message: "id must be assigned" }),
  name: z.string(),
  description: z.string().optional(),
  exerciseType: z.nativeEnum(ExerciseType),
});

export const parseCreateExerciseRequest = (
  input: unknown
): CreateExerciseRequest => {
  const parsed = createExerciseRequestSchema.safeParse(input);
  if (!parsed.success) {
    const message = parsed.error.errors.map((e) => e.message).join(", ");
    throw new ValidationError(message);
  }
  return parsed.data;
};
