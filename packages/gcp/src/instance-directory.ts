/**
 * GoogleInstanceDirectory
 *
 * InstanceDirectory backed by the Compute Engine API.
 */

import type { compute_v1 } from 'googleapis';
import {
  ConfigurationError,
  EphemeraError,
  PublishError,
  describeError,
  logger,
  type InstanceDirectory,
  type InstanceMetadata,
  type MetadataItem,
  type MetadataWriteResult,
  type ResolvedTarget,
} from '@ephemera/core';
import { httpStatusOf, type ComputeApi, type InstanceRef } from './api.js';

const HTTP_NOT_FOUND = 404;
const HTTP_PRECONDITION_FAILED = 412;

function instanceRef(target: ResolvedTarget): InstanceRef {
  return { project: target.project_id, zone: target.zone, instance: target.instance_id };
}

export class GoogleInstanceDirectory implements InstanceDirectory {
  constructor(
    private compute: ComputeApi,
    private defaultProjectId: () => Promise<string>
  ) {}

  resolveProjectId(): Promise<string> {
    return this.defaultProjectId();
  }

  async resolveAddress(target: ResolvedTarget, internal: boolean): Promise<string | null> {
    const instance = await this.getInstance(target);
    const nic = instance.networkInterfaces?.[0];
    const address = internal ? nic?.networkIP : nic?.accessConfigs?.[0]?.natIP;
    return address || null;
  }

  async readMetadata(target: ResolvedTarget): Promise<InstanceMetadata> {
    const instance = await this.getInstance(target);
    const items: MetadataItem[] = [];
    for (const item of instance.metadata?.items ?? []) {
      if (item.key) {
        items.push({ key: item.key, value: item.value ?? '' });
      }
    }
    return { fingerprint: instance.metadata?.fingerprint ?? undefined, items };
  }

  async writeMetadata(target: ResolvedTarget, metadata: InstanceMetadata): Promise<MetadataWriteResult> {
    let operation: compute_v1.Schema$Operation;
    try {
      operation = await this.compute.setMetadata({
        ...instanceRef(target),
        requestBody: { fingerprint: metadata.fingerprint, items: metadata.items },
      });
    } catch (error) {
      if (httpStatusOf(error) === HTTP_PRECONDITION_FAILED) {
        logger.info(
          { instance_id: target.instance_id, fingerprint: metadata.fingerprint },
          '[gce] Metadata changed since it was read'
        );
        return { status: 'precondition_failed', message: describeError(error) };
      }
      throw new PublishError(
        `Failed to set metadata on instance ${target.instance_id}: ${describeError(error)}`,
        { instance_id: target.instance_id, status: httpStatusOf(error) },
        { cause: error }
      );
    }

    return this.waitForOperation(target, operation);
  }

  private async waitForOperation(
    target: ResolvedTarget,
    operation: compute_v1.Schema$Operation
  ): Promise<MetadataWriteResult> {
    let current = operation;
    while (current.status !== 'DONE') {
      if (!current.name) {
        throw new PublishError(`Metadata operation on ${target.instance_id} has no name to wait on`);
      }
      logger.debug({ operation: current.name, status: current.status }, '[gce] Waiting for operation');
      current = await this.compute.waitZoneOperation({
        project: target.project_id,
        zone: target.zone,
        operation: current.name,
      });
    }

    const errors = current.error?.errors ?? [];
    const messages = errors.map(e => e.message ?? e.code ?? 'unknown error');
    if (current.httpErrorStatusCode === HTTP_PRECONDITION_FAILED) {
      logger.info(
        { instance_id: target.instance_id, operation: current.name },
        '[gce] Metadata changed before the operation completed'
      );
      return { status: 'precondition_failed', message: messages.join('; ') };
    }
    if (errors.length > 0) {
      throw new PublishError(
        `Metadata operation on ${target.instance_id} failed: ${messages.join('; ')}`,
        { instance_id: target.instance_id, operation: current.name }
      );
    }
    return { status: 'ok' };
  }

  private async getInstance(target: ResolvedTarget): Promise<compute_v1.Schema$Instance> {
    try {
      return await this.compute.getInstance(instanceRef(target));
    } catch (error) {
      const details = {
        instance_id: target.instance_id,
        zone: target.zone,
        project_id: target.project_id,
      };
      if (httpStatusOf(error) === HTTP_NOT_FOUND) {
        throw new ConfigurationError(
          `Instance ${target.instance_id} not found in ${target.project_id}/${target.zone}`,
          details,
          { cause: error }
        );
      }
      throw new EphemeraError(
        `Failed to look up instance ${target.instance_id}: ${describeError(error)}`,
        'instance_lookup_failed',
        false,
        details,
        { cause: error }
      );
    }
  }
}
