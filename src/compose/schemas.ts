import { z } from "zod";
import { parseByteSize, parseDuration } from "../utils/units";

const nameSchema = z
  .string()
  .min(1, "Name cannot be empty")
  .regex(
    /^[a-zA-Z0-9._-]+$/,
    "Name must contain only alphanumeric characters, periods, underscores, and hyphens",
  );

// Interpolated values arrive as strings, so scalars accept their string form too
const flexibleNumber = z.union([
  z.number(),
  z
    .string()
    .regex(/^-?\d+(\.\d+)?$/, "Expected a number")
    .transform(Number),
]);

const flexibleInt = flexibleNumber.pipe(z.number().int());

const flexibleBoolean = z.union([
  z.boolean(),
  z.enum(["true", "false"]).transform((v) => v === "true"),
]);

const stringOrList = z
  .union([z.string(), z.array(z.string())])
  .transform((v) => (typeof v === "string" ? [v] : v));

const scalarValue = z.union([z.string(), z.number(), z.boolean()]);

function toKeyValueMap(
  value: string[] | Record<string, string | number | boolean | null>,
): Record<string, string> {
  const result: Record<string, string> = {};
  if (Array.isArray(value)) {
    for (const entry of value) {
      const eqIdx = entry.indexOf("=");
      if (eqIdx === -1) result[entry] = "";
      else result[entry.slice(0, eqIdx)] = entry.slice(eqIdx + 1);
    }
    return result;
  }
  for (const [key, v] of Object.entries(value)) {
    result[key] = v === null ? "" : String(v);
  }
  return result;
}

const keyValueMap = z
  .union([z.array(z.string()), z.record(z.string(), scalarValue.nullable())])
  .transform(toKeyValueMap);

const byteSize = z.union([z.number(), z.string()]).transform((v, ctx) => {
  try {
    return parseByteSize(v);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: error instanceof Error ? error.message : String(error),
    });
    return z.NEVER;
  }
});

const duration = z.string().transform((v, ctx) => {
  try {
    return parseDuration(v);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: error instanceof Error ? error.message : String(error),
    });
    return z.NEVER;
  }
});

// Numbers are taken as written; strings such as "0440" are octal
export const FileModeSchema = z.union([
  z.number().int().nonnegative(),
  z
    .string()
    .regex(/^(0o)?[0-7]+$/, "File mode must be an octal number")
    .transform((v) => parseInt(v.replace(/^0o/, ""), 8)),
]);

const idSchema = z
  .union([z.string(), z.number().int()])
  .transform((v) => String(v));

export const ServiceSecretSchema = z
  .union([
    z.string().min(1, "Secret name cannot be empty"),
    z.object({
      source: z.string().min(1, "Secret source cannot be empty"),
      target: z.string().optional(),
      uid: idSchema.optional(),
      gid: idSchema.optional(),
      mode: FileModeSchema.optional(),
    }),
  ])
  .transform((v) => (typeof v === "string" ? { source: v } : v));

const DependsOnSchema = z
  .union([
    z.array(z.string()),
    z.record(
      z.string(),
      z.object({
        condition: z.string().default("service_started"),
        required: flexibleBoolean.default(true),
        restart: flexibleBoolean.optional(),
      }),
    ),
  ])
  .transform((v) => {
    if (!Array.isArray(v)) return v;
    return Object.fromEntries(
      v.map((name) => [
        name,
        { condition: "service_started", required: true },
      ]),
    );
  });

const ServiceNetworkSchema = z.object({
  aliases: z.array(z.string()).optional(),
  ipv4_address: z.string().optional(),
  ipv6_address: z.string().optional(),
  priority: flexibleInt.optional(),
});

const ServiceNetworksSchema = z
  .union([
    z.array(z.string()),
    z.record(z.string(), ServiceNetworkSchema.nullable()),
  ])
  .transform((v) =>
    Array.isArray(v) ? Object.fromEntries(v.map((name) => [name, null])) : v,
  );

const BuildSchema = z
  .union([
    z.string(),
    z.object({
      context: z.string().optional(),
      dockerfile: z.string().optional(),
      args: keyValueMap.optional(),
      target: z.string().optional(),
    }),
  ])
  .transform((v) => (typeof v === "string" ? { context: v } : v));

const ExtendsSchema = z
  .union([
    z.string(),
    z.object({ service: z.string(), file: z.string().optional() }),
  ])
  .transform((v) => (typeof v === "string" ? { service: v } : v));

const HookSchema = z.object({
  command: z.union([z.string(), z.array(z.string())]),
  user: z.string().optional(),
  privileged: flexibleBoolean.optional(),
  working_dir: z.string().optional(),
  environment: keyValueMap.optional(),
});

const UpdateConfigSchema = z.object({
  parallelism: flexibleInt.optional(),
  delay: duration.optional(),
  failure_action: z.string().optional(),
  monitor: duration.optional(),
  max_failure_ratio: flexibleNumber.optional(),
  order: z.enum(["start-first", "stop-first"]).optional(),
});

const DeploySchema = z.object({
  mode: z.string().optional(),
  replicas: flexibleInt.pipe(z.number().nonnegative()).optional(),
  labels: keyValueMap.default({}),
  update_config: UpdateConfigSchema.optional(),
  rollback_config: UpdateConfigSchema.optional(),
  restart_policy: z
    .object({
      condition: z.string().optional(),
      delay: z.string().optional(),
      max_attempts: flexibleInt.optional(),
      window: z.string().optional(),
    })
    .optional(),
  endpoint_mode: z.string().optional(),
  placement: z
    .object({
      constraints: z.array(z.string()).optional(),
      preferences: z.array(z.object({ spread: z.string() })).default([]),
      max_replicas_per_node: flexibleInt.optional(),
    })
    .default({}),
  resources: z.record(z.string(), z.unknown()).optional(),
});

const looseObject = z.record(z.string(), z.unknown());

/**
 * Service definition. Only the keys the planner reads are modelled; any other
 * Compose key (ports, volumes, environment, ...) passes through untouched.
 */
export const ServiceSchema = z
  .object({
    image: z.string().optional(),
    build: BuildSchema.optional(),
    container_name: z.string().optional(),
    depends_on: DependsOnSchema.optional(),
    links: z.array(z.string()).default([]),
    external_links: z.array(z.string()).default([]),
    networks: ServiceNetworksSchema.optional(),
    network_mode: z.string().optional(),
    net: z.string().optional(),
    restart: z.string().optional(),
    secrets: z.array(ServiceSecretSchema).default([]),
    profiles: z.array(z.string()).default([]),
    volumes_from: z.array(z.string()).default([]),
    develop: looseObject.optional(),

    hostname: z.string().optional(),
    domainname: z.string().optional(),
    dns: stringOrList.default([]),
    dns_opt: z.array(z.string()).default([]),
    dns_search: stringOrList.default([]),
    extra_hosts: z
      .union([z.array(z.string()), keyValueMap])
      .transform((v) =>
        Array.isArray(v)
          ? v
          : Object.entries(v).map(([host, ip]) => `${host}=${ip}`),
      )
      .default([]),
    mac_address: z.string().optional(),

    security_opt: z.array(z.string()).default([]),
    platform: z.string().optional(),
    working_dir: z.string().optional(),
    tmpfs: stringOrList.default([]),
    read_only: flexibleBoolean.optional(),
    shm_size: byteSize.optional(),
    cpuset: z.string().optional(),
    memswap_limit: byteSize.optional(),
    cpu_count: flexibleInt.optional(),
    cpu_percent: flexibleNumber.optional(),
    cpu_period: flexibleInt.optional(),
    cpu_quota: flexibleInt.optional(),
    cpu_rt_period: z.union([flexibleInt, duration]).optional(),
    cpu_rt_runtime: z.union([flexibleInt, duration]).optional(),
    cpu_shares: flexibleInt.optional(),
    mem_swappiness: flexibleInt.optional(),

    pid: z.string().optional(),
    ipc: z.string().optional(),
    uts: z.string().optional(),
    userns_mode: z.string().optional(),
    cgroup: z.string().optional(),
    cgroup_parent: z.string().optional(),
    isolation: z.string().optional(),
    runtime: z.string().optional(),

    stop_signal: z.string().optional(),
    stop_grace_period: z.string().optional(),
    tty: flexibleBoolean.optional(),
    stdin_open: flexibleBoolean.optional(),
    attach: flexibleBoolean.optional(),
    oom_kill_disable: flexibleBoolean.optional(),
    oom_score_adj: flexibleInt.optional(),
    pids_limit: flexibleInt.optional(),
    storage_opt: z.record(z.string(), scalarValue).optional(),
    device_cgroup_rules: z.array(z.string()).default([]),
    credential_spec: looseObject.optional(),
    group_add: z.array(idSchema).default([]),
    blkio_config: looseObject.optional(),

    labels: keyValueMap.default({}),
    annotations: keyValueMap.default({}),
    extends: ExtendsSchema.optional(),
    post_start: z.array(HookSchema).default([]),
    pre_stop: z.array(HookSchema).default([]),
    provider: looseObject.optional(),
    models: z
      .union([z.array(z.string()), looseObject])
      .transform((v) =>
        Array.isArray(v) ? Object.fromEntries(v.map((m) => [m, null])) : v,
      )
      .default({}),
    volume_driver: z.string().optional(),
    use_api_socket: flexibleBoolean.optional(),

    deploy: DeploySchema.optional(),
  })
  .passthrough();

export const SecretSchema = z.object({
  name: z.string().optional(),
  file: z.string().optional(),
  content: z.string().optional(),
  environment: z.string().optional(),
  external: z
    .union([flexibleBoolean, z.object({ name: z.string().optional() })])
    .optional(),
  labels: keyValueMap.optional(),
  driver: z.string().optional(),
  template_driver: z.string().optional(),
});

export const NetworkSchema = z
  .object({
    name: z.string().optional(),
    driver: z.string().optional(),
    external: z
      .union([flexibleBoolean, z.object({ name: z.string().optional() })])
      .optional(),
  })
  .passthrough();

export const ComposeFileSchema = z
  .object({
    name: z.string().optional(),
    version: z.string().optional(),
    services: z.record(
      nameSchema,
      ServiceSchema.nullable().transform((v) => v ?? ServiceSchema.parse({})),
    ),
    networks: z.record(z.string(), NetworkSchema.nullable()).default({}),
    secrets: z.record(nameSchema, SecretSchema.nullable()).default({}),
  })
  .passthrough();

export type RawService = z.infer<typeof ServiceSchema>;
export type RawSecret = z.infer<typeof SecretSchema>;
export type RawNetwork = z.infer<typeof NetworkSchema>;
export type ComposeFile = z.infer<typeof ComposeFileSchema>;
