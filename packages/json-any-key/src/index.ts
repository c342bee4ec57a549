export {
  decodeEntries,
  decodeEntriesLazily,
  decodeField,
  decodeFields,
  encodeEntries,
  makeMapCodec,
  type MapCodec
} from "./core/codec.js"
export {
  deserializeJson,
  deserializeJsonToHashMap,
  deserializeJsonToIter,
  deserializeJsonToMap,
  deserializeJsonToVec,
  serializeMapToJson,
  serializePairIterToJson,
  serializeToSink,
  serializeVecToJson
} from "./core/collections.js"
export { AnyKeyHashMap, AnyKeyMap, AnyKeyVec } from "./core/embedding.js"
export {
  type AppError,
  type DecodeError,
  type EncodeError,
  type FileError,
  type JsonSyntaxError,
  type KeyDecodeError,
  type KeyEncodeError,
  type MapCodecError,
  type NotJsonObject,
  renderMapCodecError,
  type ValueDecodeError,
  type ValueEncodeError
} from "./core/errors.js"
export { type CodecOptions, type ResolvedFormat } from "./core/format.js"
export { type KeyMode, keyModeOf } from "./core/key-field.js"
export {
  chunkSink,
  type FieldRejection,
  makeRecordWriter,
  makeTextWriter,
  type ObjectWriter,
  type StringSink,
  stringSink,
  type TextSink
} from "./core/object-writer.js"
export { type Entry, fromEntries, fromIterator, fromRecord, type Pair, type PairSource } from "./core/sources.js"
export { hashMapTarget, mapTarget, type PairBuilder, type PairTarget, vecTarget } from "./core/targets.js"
export { readJsonMapFile, writeJsonMapFile } from "./shell/json-map-file.js"
