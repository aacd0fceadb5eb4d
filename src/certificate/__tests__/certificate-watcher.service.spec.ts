import { EventEmitter2 } from '@nestjs/event-emitter';
import * as chokidar from 'chokidar';
import { CertificateWatcherService } from '../watcher/certificate-watcher.service';
import { CertificateStorageService } from '../storage/certificate-storage.service';
import { CERTIFICATE_FILES_CHANGED_EVENT } from '../certificate.tokens';
import { silenceNestLogger } from '../../../test/helpers/silence-logger';

jest.mock('chokidar');

describe('CertificateWatcherService', () => {
  let service: CertificateWatcherService;
  let storageService: { getStoragePath: jest.Mock; fqdnForFile: jest.Mock };
  let eventEmitter: { emit: jest.Mock };
  let handlers: Map<string, (arg: unknown) => void>;
  let mockWatcher: { on: jest.Mock; close: jest.Mock };
  let restoreLogger: () => void;

  beforeEach(() => {
    restoreLogger = silenceNestLogger();
    handlers = new Map();
    mockWatcher = {
      on: jest.fn(),
      close: jest.fn().mockResolvedValue(undefined),
    };
    mockWatcher.on.mockImplementation((event: string, handler: (arg: unknown) => void) => {
      handlers.set(event, handler);
      return mockWatcher;
    });
    (chokidar.watch as jest.Mock).mockReturnValue(mockWatcher);

    storageService = {
      getStoragePath: jest.fn().mockReturnValue('/data/certificates'),
      fqdnForFile: jest.fn((file: string) =>
        file.endsWith('app.example.com.crt') || file.endsWith('app.example.com.key') ? 'app.example.com' : undefined,
      ),
    };
    eventEmitter = { emit: jest.fn() };

    service = new CertificateWatcherService(
      storageService as unknown as CertificateStorageService,
      eventEmitter as unknown as EventEmitter2,
    );
  });

  afterEach(() => {
    restoreLogger();
    jest.clearAllMocks();
  });

  it('watches the storage directory without reporting existing files', () => {
    service.startWatching();

    expect(chokidar.watch).toHaveBeenCalledWith('/data/certificates', {
      persistent: true,
      ignoreInitial: true,
      depth: 0,
      awaitWriteFinish: { stabilityThreshold: 2000, pollInterval: 100 },
    });
  });

  it('starts only one watcher', () => {
    service.startWatching();
    service.startWatching();

    expect(chokidar.watch).toHaveBeenCalledTimes(1);
  });

  it.each(['add', 'change', 'unlink'] as const)('emits a files-changed event on %s', (change) => {
    service.startWatching();

    handlers.get(change)?.('/data/certificates/app.example.com.crt');

    expect(eventEmitter.emit).toHaveBeenCalledWith(CERTIFICATE_FILES_CHANGED_EVENT, {
      fqdn: 'app.example.com',
      path: '/data/certificates/app.example.com.crt',
      change,
    });
  });

  it('ignores files that do not belong to a hostname', () => {
    service.startWatching();

    handlers.get('change')?.('/data/certificates/acme_account.key');

    expect(eventEmitter.emit).not.toHaveBeenCalled();
  });

  it('logs watcher errors without emitting', () => {
    service.startWatching();

    expect(() => handlers.get('error')?.(new Error('EMFILE'))).not.toThrow();
    expect(eventEmitter.emit).not.toHaveBeenCalled();
  });

  it('closes the watcher on stop', async () => {
    service.startWatching();

    await service.stopWatching();
    await service.stopWatching();

    expect(mockWatcher.close).toHaveBeenCalledTimes(1);
  });
});
