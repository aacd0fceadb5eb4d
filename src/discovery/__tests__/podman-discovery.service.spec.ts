import { Test, TestingModule } from '@nestjs/testing';
import {
  PodmanDiscoveryService,
  LIST_CONTAINERS_COMMAND,
  inspectContainerCommand,
} from '../podman/podman-discovery.service';
import { SshCommandService, SshCommandError } from '../ssh/ssh-command.service';
import { DiscoveryError } from '../discovery.errors';
import { silenceNestLogger } from '../../../test/helpers/silence-logger';

describe('PodmanDiscoveryService', () => {
  let service: PodmanDiscoveryService;
  let ssh: { run: jest.Mock };
  let restoreLogger: () => void;

  beforeEach(async () => {
    restoreLogger = silenceNestLogger();
    ssh = { run: jest.fn() };

    const module: TestingModule = await Test.createTestingModule({
      providers: [PodmanDiscoveryService, { provide: SshCommandService, useValue: ssh }],
    }).compile();

    service = module.get(PodmanDiscoveryService);
  });

  afterEach(() => {
    restoreLogger();
    jest.clearAllMocks();
  });

  const inspectOutput = (networkSettings: Record<string, unknown>) =>
    JSON.stringify([{ Id: 'abc123', NetworkSettings: networkSettings }]);

  describe('list', () => {
    it('runs the container list command and returns parsed backends', async () => {
      ssh.run.mockResolvedValue('abc123\tweb\t8080\tapp.example.com\n');

      await expect(service.list()).resolves.toEqual([
        { id: 'abc123', name: 'web', fqdn: 'app.example.com', port: 8080 },
      ]);
      expect(ssh.run).toHaveBeenCalledWith(LIST_CONTAINERS_COMMAND);
    });

    it('asks podman for tab-separated output of the routing labels', () => {
      expect(LIST_CONTAINERS_COMMAND).toBe(
        'podman container list --filter label=exposed-port --filter label=exposed-fqdn --filter status=running ' +
          `--no-trunc --format '{{.ID}}\\t{{.Names}}\\t{{index .Labels "exposed-port"}}\\t{{index .Labels "exposed-fqdn"}}'`,
      );
    });

    it('returns an empty list when no containers are labelled', async () => {
      ssh.run.mockResolvedValue('');

      await expect(service.list()).resolves.toEqual([]);
    });

    it('fails with UNAVAILABLE when the command cannot run', async () => {
      ssh.run.mockRejectedValue(new SshCommandError('SSH connection to podman:22 failed: refused'));

      await expect(service.list()).rejects.toMatchObject({
        code: 'UNAVAILABLE',
        message: 'Failed to list containers: SSH connection to podman:22 failed: refused',
      });
    });

    it('fails with PARSE_ERROR when every line is malformed', async () => {
      ssh.run.mockResolvedValue('garbage\nmore garbage\n');

      const error = await service.list().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DiscoveryError);
      expect(error).toMatchObject({ code: 'PARSE_ERROR', message: 'None of the 2 container list lines could be parsed' });
    });
  });

  describe('resolveAddress', () => {
    it('inspects the container and picks the lowest-sorted network address', async () => {
      ssh.run.mockResolvedValue(
        inspectOutput({
          IPAddress: '',
          Networks: { podman: { IPAddress: '10.88.0.5' }, apps: { IPAddress: '10.89.0.3' } },
        }),
      );

      await expect(service.resolveAddress('abc123')).resolves.toBe('10.89.0.3');
      expect(ssh.run).toHaveBeenCalledWith(inspectContainerCommand('abc123'));
      expect(inspectContainerCommand('abc123')).toBe('podman container inspect abc123 --format json');
    });

    it('falls back to the top-level address', async () => {
      ssh.run.mockResolvedValue(inspectOutput({ IPAddress: '10.88.0.12', Networks: { podman: { IPAddress: '' } } }));

      await expect(service.resolveAddress('abc123')).resolves.toBe('10.88.0.12');
    });

    it('fails with NOT_FOUND when the container has no address', async () => {
      ssh.run.mockResolvedValue(inspectOutput({ IPAddress: '', Networks: {} }));

      await expect(service.resolveAddress('abc123')).rejects.toMatchObject({
        code: 'NOT_FOUND',
        message: 'Container abc123 has no network address',
      });
    });

    it('rejects an invalid id without running a command', async () => {
      await expect(service.resolveAddress('abc; reboot')).rejects.toMatchObject({ code: 'NOT_FOUND' });
      expect(ssh.run).not.toHaveBeenCalled();
    });

    it('fails with NOT_FOUND when the inspect result is not exactly one entry', async () => {
      ssh.run.mockResolvedValue('[]');

      await expect(service.resolveAddress('abc123')).rejects.toMatchObject({
        code: 'NOT_FOUND',
        message: 'Unexpected inspect result for abc123 (0 entries)',
      });
    });

    it('fails with NOT_FOUND when the container is gone', async () => {
      ssh.run.mockRejectedValue(
        new SshCommandError('exited with code 125', 125, 'Error: no such container abc123'),
      );

      await expect(service.resolveAddress('abc123')).rejects.toMatchObject({
        code: 'NOT_FOUND',
        message: 'Container abc123 no longer exists',
      });
    });

    it('fails with UNAVAILABLE on transport errors', async () => {
      ssh.run.mockRejectedValue(new SshCommandError('Command timed out after 10000ms'));

      await expect(service.resolveAddress('abc123')).rejects.toMatchObject({ code: 'UNAVAILABLE' });
    });

    it('fails with UNAVAILABLE on malformed JSON', async () => {
      ssh.run.mockResolvedValue('{not json');

      await expect(service.resolveAddress('abc123')).rejects.toMatchObject({ code: 'UNAVAILABLE' });
    });
  });
});
