export { buildIndex } from "./indexer.js";
export {
  walkTree,
  checkRoot,
  comparePaths,
  type WalkOptions,
  type WalkedFile,
} from "./walk.js";
export {
  digestFile,
  digestRanges,
  createHasher,
  CHUNK_SIZE,
  DIGEST_LENGTH,
  type DigestOptions,
  type FileDigest,
} from "./digest.js";
export { buildTreeList, type TreeListOptions } from "./list.js";
export {
  DUPE_MARKER,
  indexFromList,
  readDigestIndex,
  formatItem,
  formatGroup,
  maxSize,
  countDupes,
  dropZeroLength,
  confirmDigestIndex,
  type IndexBuildOptions,
  type ConfirmEvents,
} from "./digest-index.js";
export {
  matchTree,
  findDupes,
  dupeDirs,
  dupeSavings,
  formatSavings,
  copyDupes,
  deleteDupes,
  type DupeActionOptions,
} from "./dupes.js";
export { mapWithConcurrency } from "./pool.js";
export type {
  TreeEntry,
  TreeIndex,
  BuildIndexOptions,
  TreeItem,
  DupeGroup,
  DigestIndex,
  DigestAlgorithm,
  SymlinkPolicy,
} from "./types.js";
