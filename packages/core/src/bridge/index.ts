export {
  type BridgeHandler,
  EventBridge,
  type EventBridgeOptions,
  type EventBridgeStats,
  type SubmitResult,
} from "./event-bridge.js";
