import { randomUUID } from "node:crypto";

export const ID_GENERATOR = Symbol("ID_GENERATOR");
export const CLOCK = Symbol("CLOCK");

export type IdGenerator = () => string;
export type Clock = () => Date;

/** 32 lowercase hex characters, never reused. */
export const generateId: IdGenerator = () => randomUUID().replace(/-/g, "");

export const systemClock: Clock = () => new Date();
