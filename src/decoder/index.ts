/**
 * @module decoder
 * @description Buffered random access over parsed CSV rows
 */

export {
  createDecodingBuffer,
  type DecodingBuffer,
  KeepAllBuffer,
  type RowProducer,
  SequentialBuffer,
} from "./row-buffer";
export { DEFAULT_DECODER_CONFIGURATION, type DecoderConfiguration, DecodingSession } from "./session";
