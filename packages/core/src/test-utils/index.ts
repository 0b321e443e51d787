export {
  createTempTree,
  writeTree,
  sha256Hex,
  type TreeSpec,
  type TempTree,
} from "./tree.js";
