/**
 * Result of one deletion request. Expected delivery conditions are values,
 * not exceptions.
 */
export type DeletionOutcome =
  | { kind: 'deleted' }
  | { kind: 'not_found' }
  | { kind: 'forbidden'; detail?: string }
  | { kind: 'transient_error'; detail?: string };

export interface IMessageDeleter {
  deleteMessage(channelId: string, messageId: string): Promise<DeletionOutcome>;
}
