/**
 * IO module - output stream abstraction for testability
 */

export { StreamOutput, createStdoutOutput, createStderrOutput } from './stream-output';
export { BufferOutput, createBufferOutput } from './buffer-output';
