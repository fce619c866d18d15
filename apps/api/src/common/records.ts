import { ForbiddenException } from "@nestjs/common";

/** Drops keys whose value is `undefined` so partial inputs never clear stored fields. */
export const omitUndefined = <T extends object>(value: T): Partial<T> => {
  const result: Partial<T> = {};

  for (const key in value) {
    if (value[key] !== undefined) {
      result[key] = value[key];
    }
  }

  return result;
};

export const assertOwnership = (actorId: string, ownerId: string, message: string): void => {
  if (actorId !== ownerId) {
    throw new ForbiddenException(message);
  }
};

export const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

export const containsPattern = (value: string): RegExp => new RegExp(escapeRegExp(value.trim()), "i");
