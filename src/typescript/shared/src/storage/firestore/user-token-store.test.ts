import * as admin from 'firebase-admin';
import { UserTokenStore } from './user-token-store';
import { StorageError } from '../../errors';

const mockSet = jest.fn();
const mockGet = jest.fn();
const mockDoc = jest.fn(() => ({ set: mockSet, get: mockGet }));
const mockWithConverter = jest.fn(() => ({ doc: mockDoc }));
const mockCollection = jest.fn(() => ({ withConverter: mockWithConverter }));

const db = { collection: mockCollection } as unknown as admin.firestore.Firestore;

describe('UserTokenStore', () => {
  let store: UserTokenStore;

  beforeEach(() => {
    jest.clearAllMocks();
    store = new UserTokenStore(db, 'users-test');
  });

  it('returns the stored token', async () => {
    const token = { userId: 42, accessToken: 'a', refreshToken: 'r', expiresAt: new Date('2030-01-01T00:00:00Z') };
    mockGet.mockResolvedValue({ exists: true, data: () => token });

    await expect(store.get(42)).resolves.toEqual(token);
    expect(mockCollection).toHaveBeenCalledWith('users-test');
    expect(mockDoc).toHaveBeenCalledWith('42');
  });

  it('returns null when the athlete never authorized', async () => {
    mockGet.mockResolvedValue({ exists: false, data: () => undefined });

    await expect(store.get(42)).resolves.toBeNull();
  });

  it('replaces the whole document on save and stamps updatedAt', async () => {
    mockSet.mockResolvedValue(undefined);
    const expiresAt = new Date('2030-01-01T00:00:00Z');

    await store.save({ userId: 42, accessToken: 'a', refreshToken: 'r', expiresAt });

    expect(mockDoc).toHaveBeenCalledWith('42');
    expect(mockSet).toHaveBeenCalledWith({
      userId: 42,
      accessToken: 'a',
      refreshToken: 'r',
      expiresAt,
      updatedAt: expect.any(Date),
    });
  });

  it('wraps read failures in StorageError', async () => {
    mockGet.mockRejectedValue(new Error('UNAVAILABLE'));

    await expect(store.get(42)).rejects.toBeInstanceOf(StorageError);
  });
});
