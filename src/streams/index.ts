/**
 * Async stream plumbing: bounded channels, the producer/consumer bridge and
 * the batching operator.
 *
 * @module streams
 */

export { Channel } from "./channel.js";
export { ChannelStream, channelStream, toProducerError } from "./channel-stream.js";
export type { Sender, Producer, ChannelStreamOptions } from "./channel-stream.js";
export { batched } from "./batched.js";
export {
  StreamError,
  ChannelClosedError,
  ProducerPanicError,
  InvalidBatchSizeError,
  InvalidCapacityError,
} from "./errors.js";
