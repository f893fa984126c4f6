import WAITLIST from '../models/waitlist.model';
import {UpsertOutcome, WaitlistEntry} from '../interfaces/waitlist';

export interface WaitlistStore {
  count(): Promise<number>;
  /**
   * Inserts `entry` if no document has its email yet, otherwise only stamps
   * `updated_at` on the existing one.
   */
  upsert(entry: WaitlistEntry, now: Date): Promise<UpsertOutcome>;
}

export const mongo_waitlist_store: WaitlistStore = {
  async count() {
    return await WAITLIST.countDocuments({});
  },

  async upsert(entry, now) {
    // $setOnInsert leaves an existing document untouched; the unique index on
    // email stops two concurrent upserts from both inserting
    const inserted = await WAITLIST.updateOne(
      {email: entry.email},
      {
        $setOnInsert: {
          email: entry.email,
          city: entry.city,
          source: entry.source,
          subscribed_at: entry.subscribed_at,
        },
      },
      {upsert: true}
    );

    if (inserted.upsertedCount === 1) {
      return 'created';
    }

    await WAITLIST.updateOne({email: entry.email}, {$set: {updated_at: now}});

    return 'updated';
  },
};
