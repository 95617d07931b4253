export {
  clampPosition,
  comparePositions,
  createLineBuffer,
  detectLineEnding,
  isTerminated,
  joinLines,
  lineBufferFromLines,
  lineBuffersEqual,
  lineContentLength,
  linesEqual,
  offsetAt,
  positionAfterText,
  positionAt,
  positionsEqual,
  splitLines,
  terminate,
} from "./line_buffer.ts";
export * from "./types.ts";
