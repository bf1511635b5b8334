/**
 * Compose normalizer
 *
 * Maps a schema-validated compose file onto the project model. This is where
 * the implicit defaults Compose applies at load time are made explicit:
 * - a service with no networks and no network_mode joins `default`
 * - every `links` entry adds a matching `depends_on` entry
 * - secret definitions become a tagged source (external > file > inline)
 */

import { ComposeFile, RawNetwork, RawSecret, RawService } from "./schemas";
import {
  DependsOnConfig,
  NetworkConfig,
  Project,
  SecretDefinition,
  SecretSource,
  ServiceConfig,
  ServiceNetworkConfig,
} from "./types";
import { Environment } from "./interpolate";
import { logger } from "../utils/logger";

export interface NormalizeOptions {
  name: string;
  workingDir: string;
  /** Service names in declared order; names not listed keep object order. */
  serviceOrder?: string[];
  env?: Environment;
}

export const DEFAULT_NETWORK = "default";

function linkTarget(link: string): string {
  const colonIdx = link.indexOf(":");
  return colonIdx === -1 ? link : link.slice(0, colonIdx);
}

function normalizeService(name: string, raw: RawService): ServiceConfig {
  const dependsOn: Record<string, DependsOnConfig> = {
    ...(raw.depends_on ?? {}),
  };
  for (const link of raw.links) {
    const target = linkTarget(link);
    if (!dependsOn[target]) {
      dependsOn[target] = { condition: "service_started", required: true };
    }
  }

  let networks: Record<string, ServiceNetworkConfig | null> =
    raw.networks ?? {};
  if (Object.keys(networks).length === 0 && !raw.network_mode) {
    networks = { [DEFAULT_NETWORK]: null };
  }

  const storageOpt: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw.storage_opt ?? {})) {
    storageOpt[key] = String(value);
  }

  return {
    name,
    image: raw.image,
    build: raw.build,
    container_name: raw.container_name,
    depends_on: dependsOn,
    links: raw.links,
    external_links: raw.external_links,
    networks,
    network_mode: raw.network_mode,
    net: raw.net,
    restart: raw.restart,
    secrets: raw.secrets,
    profiles: raw.profiles,
    volumes_from: raw.volumes_from,
    develop: raw.develop,

    hostname: raw.hostname,
    domainname: raw.domainname,
    dns: raw.dns,
    dns_opt: raw.dns_opt,
    dns_search: raw.dns_search,
    extra_hosts: raw.extra_hosts,
    mac_address: raw.mac_address,

    security_opt: raw.security_opt,
    platform: raw.platform,
    working_dir: raw.working_dir,
    tmpfs: raw.tmpfs,
    read_only: raw.read_only,
    shm_size: raw.shm_size,
    cpuset: raw.cpuset,
    memswap_limit: raw.memswap_limit,
    cpu_count: raw.cpu_count,
    cpu_percent: raw.cpu_percent,
    cpu_period: raw.cpu_period,
    cpu_quota: raw.cpu_quota,
    cpu_rt_period: raw.cpu_rt_period,
    cpu_rt_runtime: raw.cpu_rt_runtime,
    cpu_shares: raw.cpu_shares,
    mem_swappiness: raw.mem_swappiness,

    pid: raw.pid,
    ipc: raw.ipc,
    uts: raw.uts,
    userns_mode: raw.userns_mode,
    cgroup: raw.cgroup,
    cgroup_parent: raw.cgroup_parent,
    isolation: raw.isolation,
    runtime: raw.runtime,

    stop_signal: raw.stop_signal,
    stop_grace_period: raw.stop_grace_period,
    tty: raw.tty,
    stdin_open: raw.stdin_open,
    attach: raw.attach,
    oom_kill_disable: raw.oom_kill_disable,
    oom_score_adj: raw.oom_score_adj,
    pids_limit: raw.pids_limit,
    storage_opt: storageOpt,
    device_cgroup_rules: raw.device_cgroup_rules,
    credential_spec: raw.credential_spec,
    group_add: raw.group_add,
    blkio_config: raw.blkio_config,

    labels: raw.labels,
    annotations: raw.annotations,
    extends: raw.extends,
    post_start: raw.post_start,
    pre_stop: raw.pre_stop,
    provider: raw.provider,
    models: raw.models,
    volume_driver: raw.volume_driver,
    use_api_socket: raw.use_api_socket,

    deploy: raw.deploy,
  };
}

function isExternal(
  external: boolean | { name?: string } | undefined,
): boolean {
  if (external === undefined) return false;
  return typeof external === "boolean" ? external : true;
}

function secretSource(
  name: string,
  raw: RawSecret,
  env: Environment,
): SecretSource {
  if (isExternal(raw.external)) {
    return { kind: "external" };
  }

  if (raw.file !== undefined && raw.file !== "") {
    if (raw.content !== undefined && raw.content !== "") {
      logger.warn(
        `Secret '${name}' sets both 'file' and 'content'; the file takes precedence`,
      );
    }
    return { kind: "file", path: raw.file };
  }

  if (raw.environment !== undefined && raw.environment !== "") {
    const value = env[raw.environment];
    if (value === undefined) {
      logger.debug(
        `Secret '${name}' reads unset variable ${raw.environment}; using empty content`,
      );
    }
    return { kind: "inline", content: value ?? "" };
  }

  return { kind: "inline", content: raw.content ?? "" };
}

function normalizeNetwork(raw: RawNetwork | null): NetworkConfig {
  return {
    name: raw?.name,
    driver: raw?.driver,
    external: isExternal(raw?.external),
  };
}

function orderedServiceNames(
  services: ComposeFile["services"],
  declared: string[] = [],
): string[] {
  const names = Object.keys(services);
  const ordered = declared.filter((name) => names.includes(name));
  for (const name of names) {
    if (!ordered.includes(name)) ordered.push(name);
  }
  return ordered;
}

export function normalizeProject(
  file: ComposeFile,
  options: NormalizeOptions,
): Project {
  const env = options.env ?? {};

  const services = orderedServiceNames(file.services, options.serviceOrder).map(
    (name) => normalizeService(name, file.services[name]),
  );

  const secrets: Record<string, SecretDefinition> = {};
  for (const [name, raw] of Object.entries(file.secrets)) {
    secrets[name] = { name, source: secretSource(name, raw ?? {}, env) };
  }

  const networks: Record<string, NetworkConfig> = {};
  for (const [name, raw] of Object.entries(file.networks)) {
    networks[name] = normalizeNetwork(raw);
  }
  const usesDefault = services.some(
    (service) => DEFAULT_NETWORK in service.networks,
  );
  if (usesDefault && !networks[DEFAULT_NETWORK]) {
    networks[DEFAULT_NETWORK] = {
      name: `${options.name}_${DEFAULT_NETWORK}`,
      external: false,
    };
  }

  return {
    name: options.name,
    workingDir: options.workingDir,
    services,
    secrets,
    networks,
  };
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
