/**
 * Toolgate Runtime Host: Configuration File Schema
 *
 * The on-disk shape of `config.json`. Every object is strict: an unknown
 * key (including a `delete` permission, which follows `update`) is a load
 * error rather than a silently ignored setting.
 *
 * Permission category keys are free strings here and are resolved against
 * the kernel's category enum (aliases included) by the loader.
 */

import { z } from 'zod';
import { LOG_LEVELS } from '../logging/logger.js';

export const DEFAULT_MANIFEST_FILENAME = 'tools-manifest.json';
export const DEFAULT_MAX_PAYLOAD_CHARS = 2000;

export const REGISTRATION_MODES = ['eager', 'lazy'] as const;
export type RegistrationMode = (typeof REGISTRATION_MODES)[number];

export const ActionPermissionsSchema = z.strictObject({
  read: z.boolean().optional(),
  create: z.boolean().optional(),
  update: z.boolean().optional(),
});

export const ConfigFileSchema = z.strictObject({
  registration: z
    .strictObject({
      mode: z.enum(REGISTRATION_MODES).default('eager'),
      manifest: z.string().min(1).default(DEFAULT_MANIFEST_FILENAME),
      precheck: z.boolean().default(true),
      enabled_categories: z.array(z.string()).default([]),
      enabled_operations: z.array(z.string()).default([]),
    })
    .prefault({}),
  permissions: z.record(z.string(), ActionPermissionsSchema).default({}),
  confirmation: z
    .strictObject({
      auto_confirm: z.boolean().default(false),
    })
    .prefault({}),
  logging: z
    .strictObject({
      level: z.enum(LOG_LEVELS).default('info'),
      max_payload_chars: z.number().int().positive().default(DEFAULT_MAX_PAYLOAD_CHARS),
    })
    .prefault({}),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;
