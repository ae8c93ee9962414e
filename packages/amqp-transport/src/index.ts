export const VERSION = "0.1.0";

export {
  AmqpConsumer,
  connectBroker,
  DEFAULT_CONSUMER_TAG,
} from "./consumer.js";
export type {
  AmqpConsumerOptions,
  BrokerConnect,
  BrokerConnection,
  BrokerChannel,
  BrokerMessage,
} from "./consumer.js";

export { headerValueToString, headersFromTable } from "./header-values.js";
