/**
 * @lexcov/core -- shared types, ports and errors for the lexcov system.
 */
export * from "./types.js";
export * from "./errors.js";
export * from "./interfaces.js";
export { lemmaOf, partOfSpeechOf } from "./morphology.js";
export { Registry } from "./registry.js";
