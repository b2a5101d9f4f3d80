import { describe, it, expect } from 'vitest';
import { spawn, type ChildProcess, type SpawnOptions } from 'child_process';
import { once } from 'events';
import { ConnectionPolicySchema, TunnelError } from '@ephemera/core';
import { GcloudIapTunnel, buildTunnelArgs, buildTunnelEnv } from '../src/index.js';

const target = { instance_id: 'vm1', zone: 'us-central1-a', project_id: 'p1' };

describe('buildTunnelArgs', () => {
  it('should forward port 22 over stdin', () => {
    expect(buildTunnelArgs(target, ConnectionPolicySchema.parse({ use_tunnel: true }))).toEqual([
      'compute',
      'start-iap-tunnel',
      'vm1',
      '22',
      '--listen-on-stdin',
      '--project=p1',
      '--zone=us-central1-a',
      '--verbosity=warning',
    ]);
  });

  it('should impersonate the configured service account', () => {
    const args = buildTunnelArgs(
      target,
      ConnectionPolicySchema.parse({ impersonation_identity: 'runner@p1.iam.gserviceaccount.com' })
    );

    expect(args.at(-1)).toBe('--impersonate-service-account=runner@p1.iam.gserviceaccount.com');
  });
});

describe('buildTunnelEnv', () => {
  it('should pass whitelisted variables and the lease environment only', () => {
    const env = buildTunnelEnv(
      { CLOUDSDK_CORE_PROJECT: 'p1' },
      { PATH: '/usr/bin', HOME: '/home/deploy', DATABASE_PASSWORD: 'test-secret', CLOUDSDK_CONFIG: '/cfg' }
    );

    expect(env).toEqual({
      PATH: '/usr/bin',
      HOME: '/home/deploy',
      CLOUDSDK_CONFIG: '/cfg',
      CLOUDSDK_CORE_PROJECT: 'p1',
    });
  });
});

describe('GcloudIapTunnel', () => {
  const policy = ConnectionPolicySchema.parse({ use_tunnel: true });

  it('should raise TunnelError when gcloud cannot be started', async () => {
    const tunnel = new GcloudIapTunnel({ gcloudPath: '/nonexistent/bin/gcloud' });

    await expect(tunnel.open(target, policy, {})).rejects.toBeInstanceOf(TunnelError);
  });

  it('should expose the process stdio as a stream and kill it on terminate', async () => {
    let child: ChildProcess | undefined;
    let spawnEnv: SpawnOptions['env'];
    const tunnel = new GcloudIapTunnel({
      spawn: (_command, _args, options) => {
        spawnEnv = options.env;
        child = spawn('cat', [], options);
        return child;
      },
    });

    const { stream, terminate } = await tunnel.open(target, policy, { CLOUDSDK_CORE_PROJECT: 'p1' });
    stream.write('SSH-2.0-probe\n');
    const [chunk]: unknown[] = await once(stream, 'data');

    expect(String(chunk)).toBe('SSH-2.0-probe\n');
    expect(spawnEnv?.CLOUDSDK_CORE_PROJECT).toBe('p1');

    await terminate();

    expect(child?.signalCode).toBe('SIGTERM');
  });

  it('should kill a process that ignores SIGTERM once the grace period ends', async () => {
    let child: ChildProcess | undefined;
    const tunnel = new GcloudIapTunnel({
      terminateGraceMs: 100,
      spawn: (_command, _args, options) => {
        child = spawn('sh', ['-c', 'trap "" TERM; echo ready; while :; do sleep 0.05; done'], options);
        return child;
      },
    });

    const { stream, terminate } = await tunnel.open(target, policy, {});
    const [chunk]: unknown[] = await once(stream, 'data');
    expect(String(chunk)).toBe('ready\n');

    await terminate();

    expect(child?.signalCode).toBe('SIGKILL');
  });
});
