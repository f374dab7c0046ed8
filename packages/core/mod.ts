export * from "./bracket.ts";
export * from "./errors.ts";
export * from "./result.ts";
export * from "./validation.ts";
export { createBrackets, outcomeOf } from "./weave.ts";
export type { BracketOptions, Brackets, OutcomeKind, Phase } from "./weave.ts";
export type * from "../ports/mod.ts";
