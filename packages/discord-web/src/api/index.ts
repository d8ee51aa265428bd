/**
 * Discord Web API - Main Exports
 */

export {
  DiscordWebClient,
  createDiscordWebClient,
  toOperationError,
  type OperationResult,
  type OperationError,
  type CallOptions,
  type ClientStatus,
} from './client.js';
