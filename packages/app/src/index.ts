export { codingKeys, duplicateCodingKeys } from "./core/coding-key.js"
export type { CodingKey, CodingKeys } from "./core/coding-key.js"
export { appendIndex, appendKey, renderPath, rootPath } from "./core/coding-path.js"
export type { CodingPath, PathSegment } from "./core/coding-path.js"
export { map, replaceNil, zip, zip3, zip4, zip5, zipAll, zipWith } from "./core/combinators.js"
export { defaultDecoderConfig, resolveDecoderConfig } from "./core/config.js"
export type { DecoderConfig, FileConfig, KeyDecodingStrategy } from "./core/config.js"
export { extract, makeDecoder } from "./core/decoder.js"
export type { Decoder, KeyedView, ScalarView, SequentialView, Target } from "./core/decoder.js"
export { isDecoding, make, run } from "./core/decoding.js"
export type { DecodedValue, Decoding } from "./core/decoding.js"
export { decodeJson, decodeTopLevel, parseDocument } from "./core/driver.js"
export {
  configError,
  endOfSequence,
  fileError,
  keyNotFound,
  parseError,
  renderDecodeError,
  typeMismatch
} from "./core/errors.js"
export type {
  ConfigError,
  DecodeError,
  DecodeFileError,
  EndOfSequence,
  FileError,
  KeyNotFound,
  ParseError,
  TypeMismatch
} from "./core/errors.js"
export type { Json, JsonArray, JsonObject, JsonScalar } from "./core/json.js"
export { convertFromSnakeCase } from "./core/key-strategy.js"
export { elements, keyed, nested, optional, optionalNested, singleValue, unkeyed } from "./core/primitives.js"
export { loadConfigFile } from "./shell/config-file.js"
export { decodeFile, decodeFileWithConfig } from "./shell/decode-file.js"
