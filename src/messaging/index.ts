/**
 * Messaging Module
 * @module messaging
 */

export {
  ConcurrentDocumenter,
  ConcurrentInformer,
  ConcurrentMessageSender,
  ZombieSink,
  checkMessage,
  type ConcurrentMessageFiringFn,
  type Documenter,
  type Informer,
  type RecordedMessageFiringFn,
} from './informer.js';
export {
  MessageRecorder,
  MessageRecordingDocumenter,
  MessageRecordingInformer,
  PathMessageRecorder,
  type PathMessageFiringFn,
  type PathRecordedMessage,
} from './message-recorder.js';
