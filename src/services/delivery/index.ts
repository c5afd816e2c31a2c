export {
  buildOutbox,
  SENDLIST_COLUMNS,
  type OutboxOptions,
  type OutboxResult,
} from "./outbox.js";
export {
  buildDeliveryPackages,
  DELIVERY_FILES,
  deliveryDirName,
  renderDeliveryInfo,
  type DeliveryOptions,
  type DeliveryResult,
} from "./packages.js";
