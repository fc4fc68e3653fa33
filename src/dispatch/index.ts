export {
  DispatchService,
  INVALID_MAGIC_MESSAGE,
  statusForError,
  type DispatchResult,
  type DispatchServiceOptions,
  type DispatchStreamOptions,
} from "./service";
