export { KincareClient } from './client.js';
export {
  CHAT_SOCKET_PATH,
  ChatChannel,
  chatSocketUrl,
  parseServerMessage,
  type ChatMessageOf,
  type ChatTransport,
} from './channel.js';
export {
  KincareError,
  KincareNotFoundError,
  KincareServerError,
  KincareUnavailableError,
  KincareValidationError,
  createKincareError,
  type KincareErrorContext,
} from './errors.js';
export type * from './types.js';
