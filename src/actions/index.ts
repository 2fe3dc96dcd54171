export { DeleteAction } from "./delete";
export { executeActions } from "./executor";
export { HistoryAction, type HistoryActionOptions, type HistoryCallback } from "./history";
export { MessageAction, resolveMessageTarget, type MessageActionOptions } from "./message";
export { ReactAction } from "./react";
export { UploadAction, type UploadActionOptions } from "./upload";
export {
  isAction,
  type Action,
  type ActionContext,
  type ActionTree,
  type DeliveryCallback,
  type EventContext,
  type MessageSender,
} from "./types";
