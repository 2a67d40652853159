export {
  KeyValue,
  KeyValueError,
  KeyValueType,
  decodeKeyValue,
  loadKeyValueFile,
  parseI32,
  parseF32,
  formatF32,
  type KeyValueData,
  type KeyValueErrorReason,
} from "./key-value.js";
