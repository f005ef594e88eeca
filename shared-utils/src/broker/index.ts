export type {
  BrokerChannel,
  BrokerConfig,
  Delivery,
  DeliveryHandler,
} from "./types";
export { BrokerConnectionError } from "./types";

export type {
  AmqpChannel,
  AmqpConnection,
  AmqpConnectorDeps,
  AmqpDial,
} from "./amqp-connector";
export { AmqpBroker, AmqpConnector } from "./amqp-connector";
export type { Settlement } from "./memory-broker";
export { MemoryBroker } from "./memory-broker";
export type { BackoffOptions } from "./retry";
export {
  backoffDelayMs,
  describeError,
  retryWithBackoff,
  RetryExhaustedError,
  sleep,
} from "./retry";
