import WAITLIST from '../../src/models/waitlist.model';
import {mongo_waitlist_store} from '../../src/services/waitlist.service';
import {WaitlistEntry} from '../../src/interfaces/waitlist';

function update_result(upsertedCount: number) {
  return {
    acknowledged: true,
    matchedCount: upsertedCount === 1 ? 0 : 1,
    modifiedCount: 0,
    upsertedCount,
    upsertedId: null,
  };
}

describe('mongo_waitlist_store', () => {
  const entry: WaitlistEntry = {
    email: 'foo@example.com',
    city: 'Milano',
    source: 'landing',
    subscribed_at: new Date('2024-05-01T09:00:00.000Z'),
  };
  const now = new Date('2024-05-02T10:30:00.000Z');

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('inserts a new entry without stamping updated_at', async () => {
    const updateOne = jest
      .spyOn(WAITLIST, 'updateOne')
      .mockResolvedValue(update_result(1));

    await expect(mongo_waitlist_store.upsert(entry, now)).resolves.toBe(
      'created'
    );
    expect(updateOne).toHaveBeenCalledTimes(1);
    expect(updateOne).toHaveBeenCalledWith(
      {email: 'foo@example.com'},
      {
        $setOnInsert: {
          email: 'foo@example.com',
          city: 'Milano',
          source: 'landing',
          subscribed_at: entry.subscribed_at,
        },
      },
      {upsert: true}
    );
  });

  it('only stamps updated_at on an existing entry', async () => {
    const updateOne = jest
      .spyOn(WAITLIST, 'updateOne')
      .mockResolvedValueOnce(update_result(0))
      .mockResolvedValueOnce(update_result(0));

    await expect(mongo_waitlist_store.upsert(entry, now)).resolves.toBe(
      'updated'
    );
    expect(updateOne).toHaveBeenCalledTimes(2);
    expect(updateOne).toHaveBeenNthCalledWith(
      2,
      {email: 'foo@example.com'},
      {$set: {updated_at: now}}
    );
  });

  it('counts every document', async () => {
    const countDocuments = jest
      .spyOn(WAITLIST, 'countDocuments')
      .mockResolvedValue(3);

    await expect(mongo_waitlist_store.count()).resolves.toBe(3);
    expect(countDocuments).toHaveBeenCalledWith({});
  });
});
