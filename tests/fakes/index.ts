/**
 * In-process fakes for the pipeline's ports, shared across tests.
 */

export { FakeTimeClock } from './time-clock.fake.js';
export { SequentialRunIdFactory } from './run-id.fake.js';
export { ScriptedValidator, Step, reportWithScore } from './validator.fake.js';
export type { ValidatorStep } from './validator.fake.js';
export { ClassDrivenValidator, reportFor } from './class-driven-validator.fake.js';
export { ScriptedGenerativeFixer, proposal } from './generative-fixer.fake.js';
