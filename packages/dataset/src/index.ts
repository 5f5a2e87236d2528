/**
 * @bitext/dataset -- indexed binary datasets of integer sequences.
 *
 * A dataset is a pair of files: a `.bin` blob of fixed-width elements and an
 * `.idx` index of item offsets. See `format.ts` for the byte layout.
 */
export { IndexedDatasetBuilder, type DatasetSummary } from "./builder.js";
export { IndexedDataset } from "./reader.js";
export {
  INDEX_MAGIC,
  INDEX_VERSION,
  HEADER_BYTES,
  encodeIndex,
  decodeIndex,
  elementCodec,
  datasetPaths,
  type DatasetIndex,
  type ElementCodec,
} from "./format.js";
