/**
 * Engine facade tests against a mocked dockerode
 */

import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import { PassThrough } from 'stream';
import Docker from 'dockerode';
import { createEngineClient, shortImageId } from '@/infra/docker/client';
import { silentLogger } from '../../../__support__/utilities/fakes';

type FollowProgress = (
  stream: NodeJS.ReadableStream,
  onFinished: (error: unknown) => void,
  onProgress: (record: unknown) => void,
) => void;

const IMAGE_ID = 'sha256:4f1c2a9be0d3c8a7e6b5f4e3d2c1b0a99887766554433221100ffeeddccbbaa9';

const mockImage = {
  inspect: jest.fn<() => Promise<{ Id: string }>>(),
  tag: jest.fn<(options: { repo: string; tag: string }) => Promise<unknown>>(),
  push: jest.fn<(options: object) => Promise<NodeJS.ReadableStream>>(),
  remove: jest.fn<(options: { force: boolean }) => Promise<unknown>>(),
};

const mockDocker = {
  ping: jest.fn<() => Promise<unknown>>(),
  info: jest.fn<() => Promise<unknown>>(),
  pull: jest.fn<(reference: string) => Promise<NodeJS.ReadableStream>>(),
  listImages: jest.fn<() => Promise<unknown[]>>(),
  getImage: jest.fn<(reference: string) => typeof mockImage>(),
  modem: { followProgress: jest.fn<FollowProgress>() },
};

jest.mock('dockerode', () => jest.fn().mockImplementation(() => mockDocker));

/**
 * Replay `records` through followProgress, then finish the stream
 */
function streamRecords(records: unknown[]): void {
  mockDocker.modem.followProgress.mockImplementation((_stream, onFinished, onProgress) => {
    records.forEach((record) => onProgress(record));
    onFinished(null);
  });
}

function engineError(message: string, fields: Record<string, unknown>): Error {
  return Object.assign(new Error(message), fields);
}

describe('createEngineClient', () => {
  let stream: PassThrough;

  beforeEach(() => {
    for (const mock of [
      ...Object.values(mockImage),
      mockDocker.ping,
      mockDocker.info,
      mockDocker.pull,
      mockDocker.listImages,
      mockDocker.getImage,
      mockDocker.modem.followProgress,
    ]) {
      mock.mockReset();
    }
    jest.mocked(Docker).mockClear();

    stream = new PassThrough();
    mockDocker.getImage.mockReturnValue(mockImage);
    mockDocker.pull.mockResolvedValue(stream);
    mockImage.push.mockResolvedValue(stream);
    mockImage.inspect.mockResolvedValue({ Id: IMAGE_ID });
    streamRecords([]);
  });

  const createClient = () =>
    createEngineClient(silentLogger(), { socketPath: '/tmp/test-docker.sock', timeout: 1000 });

  it('creates one engine handle per operation', async () => {
    const client = createClient();
    mockDocker.ping.mockResolvedValue('OK');

    await client.ping();
    await client.ping();

    expect(Docker).toHaveBeenCalledTimes(2);
    expect(Docker).toHaveBeenCalledWith({ socketPath: '/tmp/test-docker.sock', timeout: 1000 });
  });

  describe('connectivity', () => {
    it('reports a healthy daemon', async () => {
      mockDocker.ping.mockResolvedValue('OK');
      const client = createClient();

      await expect(client.testConnection()).resolves.toBe(true);
      await expect(client.getConnectionDiagnostic()).resolves.toBe('Docker connection is healthy');
    });

    it('reports an unreachable daemon', async () => {
      mockDocker.ping.mockRejectedValue(
        engineError('connect ENOENT /tmp/test-docker.sock', { code: 'ENOENT' }),
      );
      const client = createClient();

      await expect(client.testConnection()).resolves.toBe(false);
      await expect(client.getConnectionDiagnostic()).resolves.toBe(
        'Docker is not running: start Docker Desktop or the Docker service',
      );

      const ping = await client.ping();
      expect(ping.ok).toBe(false);
      if (!ping.ok) {
        expect(ping.code).toBe('ENGINE_UNAVAILABLE');
        expect(ping.error).toBe('connect ENOENT /tmp/test-docker.sock');
      }
    });
  });

  describe('getInfo', () => {
    it('returns daemon metadata', async () => {
      mockDocker.info.mockResolvedValue({ ServerVersion: '24.0.7', Images: 3, Driver: 'overlay2' });

      const result = await createClient().getInfo();

      expect(result).toEqual({
        ok: true,
        value: { ServerVersion: '24.0.7', Images: 3, Driver: 'overlay2' },
      });
    });

    it('fails on an unexpected payload', async () => {
      mockDocker.info.mockResolvedValue({ Images: 'many' });

      const result = await createClient().getInfo();

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.code).toBe('INFO_FAILED');
        expect(result.error).toBe('Unexpected response from docker info');
      }
    });
  });

  describe('pullImage', () => {
    it('pulls, follows the stream and inspects the result', async () => {
      streamRecords([{ status: 'Pulling from library/nginx' }, { status: 'Pull complete' }]);

      const result = await createClient().pullImage('nginx:latest');

      expect(mockDocker.pull).toHaveBeenCalledWith('nginx:latest');
      expect(mockDocker.getImage).toHaveBeenCalledWith('nginx:latest');
      expect(result).toEqual({
        ok: true,
        value: { id: IMAGE_ID, shortId: 'sha256:4f1c2a9be0', reference: 'nginx:latest' },
      });
    });

    it('keeps the daemon message on failure', async () => {
      mockDocker.pull.mockRejectedValue(
        engineError('(HTTP code 404) unexpected', {
          statusCode: 404,
          json: { message: 'pull access denied for ghost, repository does not exist' },
        }),
      );

      const result = await createClient().pullImage('ghost:latest');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.code).toBe('PULL_FAILED');
        expect(result.error).toBe('pull access denied for ghost, repository does not exist');
        expect(result.guidance?.hint).toBe('The image or tag does not exist');
      }
    });

    it('fails on an error record in the pull stream', async () => {
      streamRecords([{ error: 'manifest unknown', errorDetail: { message: 'manifest unknown' } }]);

      const result = await createClient().pullImage('nginx:nope');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.code).toBe('PULL_FAILED');
        expect(result.error).toBe('manifest unknown');
      }
      expect(mockImage.inspect).not.toHaveBeenCalled();
    });
  });

  describe('tagImage', () => {
    const image = { id: IMAGE_ID, shortId: 'sha256:4f1c2a9be0', reference: 'nginx:latest' };

    it('tags the pulled image into the target registry', async () => {
      mockImage.tag.mockResolvedValue({});

      const result = await createClient().tagImage(
        image,
        'localhost:5000',
        'library',
        'nginx',
        'latest',
      );

      expect(result.ok).toBe(true);
      expect(mockDocker.getImage).toHaveBeenCalledWith(IMAGE_ID);
      expect(mockImage.tag).toHaveBeenCalledWith({
        repo: 'localhost:5000/library/nginx',
        tag: 'latest',
      });
    });

    it('reports tag failures', async () => {
      mockImage.tag.mockRejectedValue(new Error('no such image'));

      const result = await createClient().tagImage(
        image,
        'localhost:5000',
        'library',
        'nginx',
        '1',
      );

      expect(result).toEqual(
        expect.objectContaining({ ok: false, code: 'TAG_FAILED', error: 'no such image' }),
      );
    });
  });

  describe('pushImage', () => {
    it('forwards each status line in order', async () => {
      streamRecords([
        { status: 'The push refers to repository [localhost:5000/library/nginx]' },
        { id: 'a1b2', progress: '[=====>   ]' },
        { status: 'latest: digest: sha256:0123 size: 1570' },
      ]);
      const statuses: string[] = [];

      const result = await createClient().pushImage('localhost:5000/library/nginx:latest', (s) => {
        statuses.push(s);
      });

      expect(result.ok).toBe(true);
      expect(mockDocker.getImage).toHaveBeenCalledWith('localhost:5000/library/nginx:latest');
      expect(statuses).toEqual([
        'The push refers to repository [localhost:5000/library/nginx]',
        'latest: digest: sha256:0123 size: 1570',
      ]);
    });

    it('awaits asynchronous listeners before the next line', async () => {
      streamRecords([{ status: 'first' }, { status: 'second' }]);
      const events: string[] = [];

      await createClient().pushImage('localhost:5000/library/nginx:latest', async (status) => {
        events.push(`start ${status}`);
        await new Promise((resolve) => setImmediate(resolve));
        events.push(`end ${status}`);
      });

      expect(events).toEqual(['start first', 'end first', 'start second', 'end second']);
    });

    it('stops at the first error record and abandons the stream', async () => {
      streamRecords([
        { status: 'Preparing' },
        { error: 'denied: requested access to the resource is denied' },
        { status: 'Pushed' },
      ]);
      const statuses: string[] = [];

      const result = await createClient().pushImage('localhost:5000/library/nginx:latest', (s) => {
        statuses.push(s);
      });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.code).toBe('PUSH_FAILED');
        expect(result.error).toBe('denied: requested access to the resource is denied');
      }
      expect(statuses).toEqual(['Preparing']);
      expect(stream.destroyed).toBe(true);
    });

    it('fails when a listener throws', async () => {
      streamRecords([{ status: 'Preparing' }, { status: 'Pushed' }]);

      const result = await createClient().pushImage('localhost:5000/library/nginx:latest', () => {
        throw new Error('observer gone');
      });

      expect(result).toEqual(
        expect.objectContaining({ ok: false, code: 'PUSH_FAILED', error: 'observer gone' }),
      );
    });

    it('fails when the stream itself errors', async () => {
      mockDocker.modem.followProgress.mockImplementation((_stream, onFinished) => {
        onFinished(new Error('socket hang up'));
      });

      const result = await createClient().pushImage('localhost:5000/library/nginx:latest');

      expect(result).toEqual(
        expect.objectContaining({ ok: false, code: 'PUSH_FAILED', error: 'socket hang up' }),
      );
    });
  });

  describe('listImages', () => {
    it('maps local images', async () => {
      mockDocker.listImages.mockResolvedValue([
        { Id: IMAGE_ID, RepoTags: ['nginx:latest'], Size: 187000000, Created: 1700000000 },
        { Id: 'sha256:dangling', Size: 10, Created: 1600000000 },
      ]);

      const result = await createClient().listImages();

      expect(result).toEqual({
        ok: true,
        value: [
          { id: IMAGE_ID, repoTags: ['nginx:latest'], size: 187000000, created: 1700000000 },
          { id: 'sha256:dangling', repoTags: [], size: 10, created: 1600000000 },
        ],
      });
    });

    it('reports listing failures', async () => {
      mockDocker.listImages.mockRejectedValue(new Error('daemon busy'));

      const result = await createClient().listImages();

      expect(result).toEqual(expect.objectContaining({ ok: false, code: 'LIST_FAILED' }));
    });
  });

  describe('removeImage', () => {
    it('removes with the requested force flag', async () => {
      mockImage.remove.mockResolvedValue([]);

      const result = await createClient().removeImage('nginx:latest', true);

      expect(result.ok).toBe(true);
      expect(mockImage.remove).toHaveBeenCalledWith({ force: true });
    });

    it('does not force by default', async () => {
      mockImage.remove.mockResolvedValue([]);

      await createClient().removeImage('nginx:latest');

      expect(mockImage.remove).toHaveBeenCalledWith({ force: false });
    });

    it('reports conflicts', async () => {
      mockImage.remove.mockRejectedValue(
        engineError('(HTTP code 409) conflict', {
          statusCode: 409,
          json: { message: 'conflict: unable to remove repository reference "nginx:latest"' },
        }),
      );

      const result = await createClient().removeImage('nginx:latest');

      expect(result).toEqual(
        expect.objectContaining({
          ok: false,
          code: 'REMOVE_FAILED',
          error: 'conflict: unable to remove repository reference "nginx:latest"',
        }),
      );
    });
  });
});

describe('shortImageId', () => {
  it('keeps the digest prefix and ten hex characters', () => {
    expect(shortImageId(IMAGE_ID)).toBe('sha256:4f1c2a9be0');
  });

  it('shortens bare ids to ten characters', () => {
    expect(shortImageId('4f1c2a9be0d3c8a7')).toBe('4f1c2a9be0');
  });
});
