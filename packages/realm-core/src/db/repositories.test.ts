import { beforeEach, describe, expect, it, vi } from 'vitest';

const { mockSend } = vi.hoisted(() => ({
  mockSend: vi.fn(),
}));

vi.mock('@aws-sdk/client-dynamodb', () => ({
  DynamoDBClient: vi.fn().mockImplementation(function () {
    return {};
  }),
}));

vi.mock('@aws-sdk/lib-dynamodb', () => ({
  DynamoDBDocumentClient: {
    from: () => ({ send: mockSend }),
  },
  GetCommand: vi.fn().mockImplementation(function (params: Record<string, unknown>) {
    return { ...params, _type: 'Get' };
  }),
  QueryCommand: vi.fn().mockImplementation(function (params: Record<string, unknown>) {
    return { ...params, _type: 'Query' };
  }),
}));

// Import after mocks
import { getLatestUpdateMessageFlagActivity } from './activity-repository';
import { customerHasPlan, getCustomerByRealm } from './billing-repository';
import { resetClients } from './client';
import { getDefaultTwoFactorDevice } from './device-repository';
import { getRealm, getUserProfile } from './realm-repository';
import { getMaxMessageId, getStreamByName } from './stream-repository';

describe('realm-core repositories', () => {
  beforeEach(() => {
    mockSend.mockReset();
    resetClients();
    process.env.HOMEVIEW_TABLE = 'homeview-test';
  });

  describe('getRealm', () => {
    it('should map the item and fill defaults', async () => {
      mockSend.mockResolvedValueOnce({
        Item: {
          pk: 'REALM#r1',
          sk: '#META',
          gsi1pk: 'SUBDOMAIN#zephyr',
          gsi1sk: '#META',
          realmId: 'r1',
          name: 'Zephyr',
          subdomain: 'zephyr',
          planType: 'standard_free',
          createdAt: '2024-01-01T00:00:00.000Z',
        },
      });

      const realm = await getRealm('r1');

      expect(realm).toEqual({
        realmId: 'r1',
        name: 'Zephyr',
        subdomain: 'zephyr',
        planType: 'standard_free',
        webathenaEnabled: false,
        botCreationPolicy: 'everyone',
        createdAt: '2024-01-01T00:00:00.000Z',
      });
      expect(mockSend).toHaveBeenCalledWith(
        expect.objectContaining({
          _type: 'Get',
          TableName: 'homeview-test',
          Key: { pk: 'REALM#r1', sk: '#META' },
        })
      );
    });

    it('should return null when missing', async () => {
      mockSend.mockResolvedValueOnce({});
      expect(await getRealm('missing')).toBeNull();
    });
  });

  describe('getUserProfile', () => {
    it('should read the user from the realm partition', async () => {
      mockSend.mockResolvedValueOnce({
        Item: {
          pk: 'REALM#r1',
          sk: 'USER#7',
          userId: 7,
          realmId: 'r1',
          email: 'cordelia@example.com',
          fullName: 'Cordelia',
          role: 'guest',
          colorScheme: 2,
          defaultLanguage: 'de',
          isActive: true,
          createdAt: '2024-01-01T00:00:00.000Z',
        },
      });

      const user = await getUserProfile('r1', 7);

      expect(user?.role).toBe('guest');
      expect(user?.colorScheme).toBe(2);
      expect(user?.isBillingAdmin).toBe(false);
      expect(user?.tutorialStatus).toBe('finished');
      expect(mockSend).toHaveBeenCalledWith(
        expect.objectContaining({ Key: { pk: 'REALM#r1', sk: 'USER#7' } })
      );
    });
  });

  describe('getStreamByName', () => {
    it('should look the stream up case-insensitively', async () => {
      mockSend.mockResolvedValueOnce({
        Item: {
          pk: 'REALM#r1',
          sk: 'STREAM#denmark',
          streamId: 3,
          realmId: 'r1',
          name: 'Denmark',
          recipientId: 30,
          createdAt: '2024-01-01T00:00:00.000Z',
        },
      });

      const stream = await getStreamByName('r1', 'DENMARK');

      expect(stream).toEqual({
        streamId: 3,
        realmId: 'r1',
        name: 'Denmark',
        recipientId: 30,
        createdAt: '2024-01-01T00:00:00.000Z',
      });
      expect(mockSend).toHaveBeenCalledWith(
        expect.objectContaining({ Key: { pk: 'REALM#r1', sk: 'STREAM#denmark' } })
      );
    });
  });

  describe('getMaxMessageId', () => {
    it('should query newest first and parse the sort key', async () => {
      mockSend.mockResolvedValueOnce({ Items: [{ sk: 'MSG#0000000000000009' }] });

      expect(await getMaxMessageId(30)).toBe(9);
      expect(mockSend).toHaveBeenCalledWith(
        expect.objectContaining({
          _type: 'Query',
          ScanIndexForward: false,
          Limit: 1,
          ExpressionAttributeValues: { ':pk': 'RECIPIENT#30', ':skPrefix': 'MSG#' },
        })
      );
    });

    it('should return null for a recipient without messages', async () => {
      mockSend.mockResolvedValueOnce({ Items: [] });
      expect(await getMaxMessageId(31)).toBeNull();
    });
  });

  describe('getLatestUpdateMessageFlagActivity', () => {
    it('should pick the latest of both flag queries', async () => {
      mockSend.mockResolvedValueOnce({
        Items: [
          {
            pk: 'USER#7',
            sk: 'ACTIVITY#update_message_flags',
            userId: 7,
            query: 'update_message_flags',
            client: 'website',
            count: 4,
            lastVisit: '2024-03-01T10:00:00.000Z',
          },
          {
            pk: 'USER#7',
            sk: 'ACTIVITY#update_message_flags_for_narrow',
            userId: 7,
            query: 'update_message_flags_for_narrow',
            client: 'website',
            count: 1,
            lastVisit: '2024-03-02T10:00:00.000Z',
          },
        ],
      });

      const activity = await getLatestUpdateMessageFlagActivity(7);

      expect(activity?.query).toBe('update_message_flags_for_narrow');
      expect(activity).not.toHaveProperty('pk');
    });

    it('should return null without activity', async () => {
      mockSend.mockResolvedValueOnce({ Items: [] });
      expect(await getLatestUpdateMessageFlagActivity(7)).toBeNull();
    });
  });

  describe('billing', () => {
    it('should return null when the realm has no customer', async () => {
      mockSend.mockResolvedValueOnce({});
      expect(await getCustomerByRealm('r1')).toBeNull();
    });

    it('should strip keys from the customer', async () => {
      mockSend.mockResolvedValueOnce({
        Item: {
          pk: 'REALM#r1',
          sk: 'CUSTOMER',
          customerId: 'c1',
          realmId: 'r1',
          sponsorshipPending: true,
          createdAt: '2024-01-01T00:00:00.000Z',
        },
      });

      expect(await getCustomerByRealm('r1')).toEqual({
        customerId: 'c1',
        realmId: 'r1',
        sponsorshipPending: true,
        createdAt: '2024-01-01T00:00:00.000Z',
      });
    });

    it('should report whether a plan exists', async () => {
      mockSend.mockResolvedValueOnce({ Items: [{ sk: 'PLAN#p1' }] });
      expect(await customerHasPlan('c1')).toBe(true);

      mockSend.mockResolvedValueOnce({ Items: [] });
      expect(await customerHasPlan('c1')).toBe(false);
    });
  });

  describe('getDefaultTwoFactorDevice', () => {
    it('should ignore unconfirmed and backup devices', async () => {
      mockSend.mockResolvedValueOnce({
        Items: [
          { pk: 'USER#7', sk: 'DEVICE#a', deviceId: 'a', userId: 7, name: 'default', kind: 'totp', confirmed: false, createdAt: '' },
          { pk: 'USER#7', sk: 'DEVICE#b', deviceId: 'b', userId: 7, name: 'backup', kind: 'static', confirmed: true, createdAt: '' },
          { pk: 'USER#7', sk: 'DEVICE#c', deviceId: 'c', userId: 7, name: 'default', kind: 'phone', confirmed: true, createdAt: '' },
        ],
      });

      const device = await getDefaultTwoFactorDevice(7);

      expect(device?.deviceId).toBe('c');
    });

    it('should return null without devices', async () => {
      mockSend.mockResolvedValueOnce({ Items: [] });
      expect(await getDefaultTwoFactorDevice(7)).toBeNull();
    });
  });
});
