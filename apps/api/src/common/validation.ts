import { BadRequestException } from "@nestjs/common";
import type { ErrorIssue } from "@runfund/types";
import type { z, ZodTypeAny } from "zod";

/**
 * Parses an untrusted request value, turning zod failures into a 400 whose
 * body carries the individual issues for the error envelope.
 */
export const parseInput = <TSchema extends ZodTypeAny>(schema: TSchema, value: unknown): z.output<TSchema> => {
  const result = schema.safeParse(value);

  if (!result.success) {
    const issues: ErrorIssue[] = result.error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message
    }));

    throw new BadRequestException({ message: "Request validation failed.", issues });
  }

  return result.data;
};
