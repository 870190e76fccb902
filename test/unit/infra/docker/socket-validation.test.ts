/**
 * Unit tests for Docker socket detection and address translation
 */

import { describe, it, expect, afterEach } from '@jest/globals';
import { autoDetectDockerSocket, toDockerOptions } from '@/infra/docker/socket-validation';

describe('Docker Socket Validation', () => {
  describe('autoDetectDockerSocket', () => {
    const originalPlatform = process.platform;

    afterEach(() => {
      Object.defineProperty(process, 'platform', {
        value: originalPlatform,
        writable: true,
        configurable: true,
      });
    });

    it('returns the named pipe on win32', () => {
      Object.defineProperty(process, 'platform', {
        value: 'win32',
        writable: true,
        configurable: true,
      });

      expect(autoDetectDockerSocket()).toBe('npipe://./pipe/docker_engine');
    });

    it('returns a Unix socket path elsewhere', () => {
      Object.defineProperty(process, 'platform', {
        value: 'linux',
        writable: true,
        configurable: true,
      });

      expect(autoDetectDockerSocket()).toMatch(/docker\.sock$/);
    });
  });

  describe('toDockerOptions', () => {
    it('uses a plain path as the socket', () => {
      expect(toDockerOptions('/var/run/docker.sock')).toEqual({
        socketPath: '/var/run/docker.sock',
      });
    });

    it('strips the unix:// scheme', () => {
      expect(toDockerOptions('unix:///var/run/docker.sock', 5000)).toEqual({
        socketPath: '/var/run/docker.sock',
        timeout: 5000,
      });
    });

    it('keeps the pipe path for npipe addresses', () => {
      expect(toDockerOptions('npipe://./pipe/docker_engine')).toEqual({
        socketPath: '//./pipe/docker_engine',
      });
    });

    it('maps tcp:// to an http daemon', () => {
      expect(toDockerOptions('tcp://10.0.0.5:2376')).toEqual({
        protocol: 'http',
        host: '10.0.0.5',
        port: 2376,
      });
    });

    it('defaults the daemon port', () => {
      expect(toDockerOptions('tcp://docker.internal')).toEqual({
        protocol: 'http',
        host: 'docker.internal',
        port: 2375,
      });
    });

    it('keeps https daemons on https', () => {
      expect(toDockerOptions('https://docker.internal:2376', 1000)).toEqual({
        protocol: 'https',
        host: 'docker.internal',
        port: 2376,
        timeout: 1000,
      });
    });
  });
});
