/**
 * Docker socket auto-detection
 */

import { statSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import type { DockerOptions } from 'dockerode';

const DEFAULT_UNIX_SOCKET = '/var/run/docker.sock';
const DEFAULT_WINDOWS_PIPE = 'npipe://./pipe/docker_engine';

/**
 * Get Colima socket paths in order of preference.
 */
function getColimaSockets(): string[] {
  const homeDir = homedir();
  return [
    join(homeDir, '.colima/default/docker.sock'),
    join(homeDir, '.colima/docker/docker.sock'),
    join(homeDir, '.lima/colima/sock/docker.sock'),
  ];
}

function isSocket(path: string): boolean {
  return statSync(path, { throwIfNoEntry: false })?.isSocket() ?? false;
}

/**
 * Auto-detect Docker socket path with Colima support (synchronous).
 * Falls back to the standard Unix socket when nothing is found.
 */
export function autoDetectDockerSocket(): string {
  if (process.platform === 'win32') {
    return DEFAULT_WINDOWS_PIPE;
  }

  const candidates = [DEFAULT_UNIX_SOCKET, ...getColimaSockets()];
  return candidates.find(isSocket) ?? DEFAULT_UNIX_SOCKET;
}

/**
 * Translate a configured engine address into dockerode connection options.
 *
 * Accepts a Unix socket path, a `unix://` URL, a Windows named pipe, or a
 * `tcp://` / `http://` / `https://` daemon URL.
 */
export function toDockerOptions(address: string, timeout?: number): DockerOptions {
  const options: DockerOptions = {};

  if (/^(tcp|http|https):\/\//.test(address)) {
    const url = new URL(address.replace(/^tcp:/, 'http:'));
    options.protocol = url.protocol === 'https:' ? 'https' : 'http';
    options.host = url.hostname;
    options.port = url.port ? Number(url.port) : 2375;
  } else if (address.startsWith('npipe://')) {
    options.socketPath = address.replace(/^npipe:/, '');
  } else {
    options.socketPath = address.replace(/^unix:\/\//, '');
  }

  if (timeout !== undefined) {
    options.timeout = timeout;
  }

  return options;
}
