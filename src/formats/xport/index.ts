export { decodeXport, XportDecoder, HEADERS, RECORD_LENGTH } from './xport-decoder.js';
export { decodeIbmFloat, isMissingNumeric } from './ibm-float.js';
