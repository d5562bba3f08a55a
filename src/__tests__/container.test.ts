import { buildPasteService } from '../container';
import { PasteService } from '../services/paste.service';
import { testConfig } from './helpers';

const mockClient = {
  on: jest.fn(),
  connect: jest.fn().mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:6379')),
  disconnect: jest.fn().mockResolvedValue(undefined),
  isOpen: false
};

jest.mock('redis', () => ({
  createClient: jest.fn(() => mockClient)
}));

describe('buildPasteService', () => {
  let pastes: PasteService;

  afterEach(async () => {
    await pastes.close();
  });

  it('should start without a cache when Redis refuses the connection', async () => {
    pastes = await buildPasteService(testConfig({ redisUrl: 'redis://localhost:6379' }));

    expect(mockClient.connect).toHaveBeenCalledTimes(1);
    expect(console.warn).toHaveBeenCalledWith(
      '⚠️  Redis unavailable, running without a cache:',
      'connect ECONNREFUSED 127.0.0.1:6379'
    );

    const created = await pastes.createPaste({ content: 'no cache', ttlSeconds: 60, clientId: 'client-a' });
    const read = await pastes.getPasteContent(created.token);
    expect(read.content.toString('utf8')).toBe('no cache');
  });

  it('should not touch Redis when the cache is disabled', async () => {
    mockClient.connect.mockClear();
    pastes = await buildPasteService(testConfig({ redisUrl: 'redis://localhost:6379', cacheTtlSeconds: 0 }));

    expect(mockClient.connect).not.toHaveBeenCalled();
  });
});
