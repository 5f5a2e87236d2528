/**
 * @bitext/dictionary -- frequency-ranked vocabularies.
 */
export {
  Dictionary,
  BOS_WORD,
  PAD_WORD,
  EOS_WORD,
  UNK_WORD,
  type DictionaryEntry,
} from "./dictionary.js";
export { buildDictionary, loadDictionary, saveDictionary } from "./persist.js";
