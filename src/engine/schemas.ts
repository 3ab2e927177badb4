/**
 * Runtime schemas for the JSON the engine prints with `--format '{{json ...}}'`.
 * Fields the orchestrator does not read are left out and ignored.
 */

import { z } from 'zod';

export const LocalNodeStateSchema = z.enum(['inactive', 'pending', 'active', 'error', 'locked']);
export type LocalNodeState = z.infer<typeof LocalNodeStateSchema>;

export const RemoteManagerSchema = z.object({
  NodeID: z.string(),
  Addr: z.string(),
});

export const SwarmInfoSchema = z.object({
  NodeID: z.string().default(''),
  NodeAddr: z.string().default(''),
  LocalNodeState: LocalNodeStateSchema,
  ControlAvailable: z.boolean().default(false),
  Error: z.string().default(''),
  RemoteManagers: z.array(RemoteManagerSchema).nullable().default(null),
  Cluster: z
    .object({
      ID: z.string().default(''),
      Spec: z
        .object({
          EncryptionConfig: z
            .object({ AutoLockManagers: z.boolean().default(false) })
            .default({}),
        })
        .default({}),
    })
    .nullable()
    .default(null),
});

export const ServiceRowSchema = z.object({
  ID: z.string(),
  Name: z.string(),
  Mode: z.string().default(''),
  Replicas: z.string().default(''),
  Ports: z.string().default(''),
});

export const NodeRowSchema = z.object({
  ID: z.string(),
  Hostname: z.string(),
  Status: z.string(),
  Availability: z.string().default(''),
  ManagerStatus: z.string().default(''),
});
