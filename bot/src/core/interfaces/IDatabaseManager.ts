import { Infraction, NewInfraction } from '../../database/DatabaseManager';

/**
 * Durable infraction store. Every call is a synchronous statement that has
 * reached disk when it returns; failures raise PersistenceError.
 */
export interface IDatabaseManager {
  initialize(): void;
  close(): void;

  /** Returns null when the message already has a pending infraction. */
  addInfraction(infraction: NewInfraction): Infraction | null;
  getInfractionByMessageId(messageId: string): Infraction | null;
  getDueInfractions(now: Date): Infraction[];
  getPendingInfractions(limit?: number): Infraction[];
  countPendingInfractions(): number;
  removeInfraction(id: number): boolean;
}
