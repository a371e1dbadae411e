import { MemoryAccessGroupDestination, MemoryContactsDestination } from './memory_destination';

describe('Memory destinations', () => {
  describe('MemoryContactsDestination', () => {
    it('[EARS-1] should create a new contact on every add, duplicates included', async () => {
      const destination = new MemoryContactsDestination(['uid1']);

      await destination.addMember('uid1');
      const collection = await destination.refresh();

      expect(destination.identifiers()).toEqual(['uid1', 'uid1']);
      expect(collection.records.map((r) => r.recordKey)).toEqual(['CID_1', 'CID_2']);
      expect(destination.mutations).toEqual([{ op: 'add', key: 'uid1' }]);
    });

    it('[EARS-2] should keep contacts without an extRef as null identifiers', async () => {
      const destination = new MemoryContactsDestination([null, 'uid2']);

      const collection = await destination.refresh();

      expect(collection.records.map((r) => r.identifier)).toEqual([null, 'uid2']);
    });

    it('[EARS-3] should remove by record key and report missing records', async () => {
      const destination = new MemoryContactsDestination(['uid1', 'uid2']);

      await expect(destination.removeMember({ identifier: 'uid1', recordKey: 'CID_1', attributes: {} })).resolves.toBe('applied');
      await expect(destination.removeMember({ identifier: 'uid1', recordKey: 'CID_1', attributes: {} })).resolves.toBe('not_found');
      expect(destination.identifiers()).toEqual(['uid2']);
    });

    it('[EARS-4] should throw an injected failure once', async () => {
      const destination = new MemoryContactsDestination();
      destination.failNext('add', new Error('boom'));

      await expect(destination.addMember('uid1')).rejects.toThrow('boom');
      await expect(destination.addMember('uid1')).resolves.toBe('applied');
    });
  });

  describe('MemoryAccessGroupDestination', () => {
    it('[EARS-5] should keep members unique by id', async () => {
      const destination = new MemoryAccessGroupDestination(['uid1'], { name: 'faculty' });

      await expect(destination.addMember('uid1')).resolves.toBe('already_present');
      await expect(destination.addMember('uid2')).resolves.toBe('applied');
      expect(destination.identifiers()).toEqual(['uid1', 'uid2']);
      expect(destination.describe()).toBe('memory:faculty');
    });

    it('[EARS-6] should count refreshes', async () => {
      const destination = new MemoryAccessGroupDestination();

      await destination.refresh();
      await destination.refresh();

      expect(destination.refreshCount).toBe(2);
    });
  });
});
