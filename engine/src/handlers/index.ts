export {
  SwapfileHandler,
  SWITCHED_MESSAGE,
  STALE_DELETED_MESSAGE,
  READ_ONLY_MESSAGE,
  type SwapfileHandlerDeps,
} from './swapfile-handler.js';
