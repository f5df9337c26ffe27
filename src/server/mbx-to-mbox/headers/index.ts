export { ENVELOPE_FIELD, HeaderRecord, UNKNOWN_SENDER } from "./header-record.js";
