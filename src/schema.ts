import { z } from "zod";

const canvasIdSchema = z.union([
  z.number().int().positive(),
  z
    .string()
    .trim()
    .regex(/^\d+$/, "ids must be numeric")
    .transform((value) => Number(value))
]);

export const courseParamsSchema = z.object({
  courseId: z
    .string()
    .trim()
    .regex(/^\d+$/, "course_id must be numeric")
    .transform((value) => Number(value))
});

export const updateBodySchema = z.object({
  percent: z.preprocess(
    (value) => (typeof value === "string" && value.trim().length === 0 ? null : value),
    z
      .union([
        z.number().int("percent must be a whole number"),
        z
          .string()
          .trim()
          .regex(/^-?\d+$/, "percent must be a whole number")
          .transform((value) => Number(value))
      ])
      .nullable()
      .optional()
  ),
  user_ids: z.array(canvasIdSchema).default([])
});

export const filterQuerySchema = z.object({
  query: z.string().trim().toLowerCase().default(""),
  page: z.coerce.number().int().min(1).default(1),
  per_page: z.coerce.number().int().min(1).max(100).optional()
});

export const launchBodySchema = z.record(z.string());
