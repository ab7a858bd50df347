import type { ChangeEntry } from '@claimwatch/protocol';

/**
 * One page read from the change stream
 */
export type ChangePage = {
  entries: ChangeEntry[];

  /**
   * Opaque cursor to resume reading after the last returned entry.
   * Equal to the input cursor when nothing new was available.
   */
  nextCursor: string | null;
};

/**
 * The revision-stream collaborator.
 *
 * Produces change entries in revision order. Each call returns a finite page;
 * reading can be restarted from any cursor previously returned.
 */
export interface ChangeStream {
  /**
   * Read entries after `cursor` (null = from the beginning)
   */
  read(cursor: string | null, limit: number): Promise<ChangePage>;
}
