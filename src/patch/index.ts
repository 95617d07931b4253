export {
  applyModifications,
  shiftLine,
  sortModifications,
  validateModifications,
} from "./apply.ts";
export { diffLines } from "./diff.ts";
export * from "./types.ts";
