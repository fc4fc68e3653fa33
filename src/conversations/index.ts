export {
  ConversationStore,
  DEFAULT_CONVERSATION_MAX_AGE_HOURS,
  hoursToMs,
  type ConversationStoreOptions,
} from "./store";
export { ConversationSweeper, DEFAULT_SWEEP_INTERVAL_MS } from "./sweeper";
export type { Conversation, ConversationMessage } from "./types";
