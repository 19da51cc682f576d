/**
 * Persisted shape of a reaction-role message (version 2).
 *
 * `RoleMessageSchema` accepts anything: the preprocessing step upgrades legacy
 * documents before validation, so stores can load old and new data alike.
 */
import { z } from "zod";
import {
  BINDING_MODES,
  DEFAULT_DESCRIPTION,
  DEFAULT_TITLE,
  ROLE_MESSAGE_STYLES,
  ROLE_MESSAGE_VERSION,
} from "./constants";
import { migrateRoleMessage } from "./migrate";

export const BindingSchema = z.object({
  roleId: z.string().min(1),
  mode: z.enum(BINDING_MODES).catch("normal"),
  label: z.string().nullable().catch(null),
  emoji: z.string().nullable().catch(null),
  description: z.string().nullable().catch(null),
  orphaned: z.boolean().catch(false),
});

export const CategorySchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  emoji: z.string().nullable().catch(null),
  description: z.string().nullable().catch(null),
  bindings: z.array(BindingSchema).catch([]),
});

export const RoleMessageSettingsSchema = z.object({
  requiredRoles: z.array(z.string()).catch([]),
  maxRoles: z.number().int().positive().nullable().catch(null),
});

export const DisplaySchema = z.object({
  title: z.string().catch(DEFAULT_TITLE),
  description: z.string().catch(DEFAULT_DESCRIPTION),
  color: z.number().int().min(0).max(0xffffff).nullable().catch(null),
});

export const RoleMessageV2Schema = z.object({
  _id: z.string(),
  version: z.literal(ROLE_MESSAGE_VERSION),
  guildId: z.string().min(1),
  messageId: z.string().min(1),
  channelId: z.string().nullable(),
  style: z.enum(ROLE_MESSAGE_STYLES),
  settings: RoleMessageSettingsSchema.catch({ requiredRoles: [], maxRoles: null }),
  triggers: z.record(z.string(), BindingSchema).catch({}),
  categories: z.array(CategorySchema).catch([]),
  display: DisplaySchema.catch({
    title: DEFAULT_TITLE,
    description: DEFAULT_DESCRIPTION,
    color: null,
  }),
  stale: z.boolean().catch(false),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
});

export const RoleMessageSchema = z.preprocess(
  (raw) => migrateRoleMessage(raw),
  RoleMessageV2Schema,
);

export type Binding = z.infer<typeof BindingSchema>;
export type Category = z.infer<typeof CategorySchema>;
export type RoleMessageSettings = z.infer<typeof RoleMessageSettingsSchema>;
export type RoleMessageDisplay = z.infer<typeof DisplaySchema>;
export type RoleMessage = z.infer<typeof RoleMessageV2Schema>;
export type BindingMode = (typeof BINDING_MODES)[number];
export type RoleMessageStyle = (typeof ROLE_MESSAGE_STYLES)[number];
