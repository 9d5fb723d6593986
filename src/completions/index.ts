export { completionPath, completionTarget, type CompletionTarget } from "./paths.js";
export {
  createCompletionGenerator,
  generateScript,
  type CompletionGenerator,
  type CompletionSink,
} from "./generator.js";
export { writeCompletion, type CompletionWriteResult, type CompletionOutcome } from "./writer.js";
