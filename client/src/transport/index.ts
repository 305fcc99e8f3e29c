export {
  createNatsTransportHandler,
  type NatsRequester,
  type NatsTransportParams,
} from "./nats-transport.js";
