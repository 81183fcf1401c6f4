/**
 * Threading module: logical lanes and host-thread marshalling.
 */

export {
  currentThread,
  LogicalThread,
  MAIN_THREAD,
  runTask,
  type ThreadTask,
} from './thread.js';
export {
  ThreadAffinityError,
  ThreadMarshaller,
  type ThreadMarshallerStats,
  type ThreadingMode,
} from './marshaller.js';
