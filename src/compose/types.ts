/**
 * Loaded project model. Keys keep their Compose spelling so the warning
 * catalogue and user-facing messages line up with the file the user wrote.
 * Everything here is produced by the loader and frozen afterwards.
 */

export interface BuildConfig {
  context?: string;
  dockerfile?: string;
  args?: Record<string, string>;
  target?: string;
}

export interface DependsOnConfig {
  condition: string;
  required: boolean;
  restart?: boolean;
}

export interface ServiceNetworkConfig {
  aliases?: string[];
  ipv4_address?: string;
  ipv6_address?: string;
  priority?: number;
}

export interface ServiceSecretReference {
  source: string;
  target?: string;
  uid?: string;
  gid?: string;
  mode?: number;
}

export interface ServiceHook {
  command: string | string[];
  user?: string;
  privileged?: boolean;
  working_dir?: string;
  environment?: Record<string, string>;
}

export interface ExtendsConfig {
  service: string;
  file?: string;
}

export interface UpdateConfig {
  parallelism?: number;
  /** Milliseconds. */
  delay?: number;
  failure_action?: string;
  /** Milliseconds. */
  monitor?: number;
  max_failure_ratio?: number;
  order?: string;
}

export interface RestartPolicy {
  condition?: string;
  delay?: string;
  max_attempts?: number;
  window?: string;
}

export interface PlacementPreference {
  spread: string;
}

export interface Placement {
  constraints?: string[];
  preferences: PlacementPreference[];
  max_replicas_per_node?: number;
}

export interface DeployConfig {
  mode?: string;
  replicas?: number;
  labels: Record<string, string>;
  update_config?: UpdateConfig;
  rollback_config?: UpdateConfig;
  restart_policy?: RestartPolicy;
  endpoint_mode?: string;
  placement: Placement;
  resources?: Record<string, unknown>;
}

export interface ServiceConfig {
  name: string;
  image?: string;

  build?: BuildConfig;
  container_name?: string;
  depends_on: Record<string, DependsOnConfig>;
  links: string[];
  external_links: string[];
  networks: Record<string, ServiceNetworkConfig | null>;
  network_mode?: string;
  net?: string;
  restart?: string;
  secrets: ServiceSecretReference[];
  profiles: string[];
  volumes_from: string[];
  develop?: Record<string, unknown>;

  hostname?: string;
  domainname?: string;
  dns: string[];
  dns_opt: string[];
  dns_search: string[];
  extra_hosts: string[];
  mac_address?: string;

  security_opt: string[];
  platform?: string;
  working_dir?: string;
  tmpfs: string[];
  read_only?: boolean;
  /** Bytes. */
  shm_size?: number;
  cpuset?: string;
  /** Bytes. */
  memswap_limit?: number;
  cpu_count?: number;
  cpu_percent?: number;
  cpu_period?: number;
  cpu_quota?: number;
  cpu_rt_period?: number;
  cpu_rt_runtime?: number;
  cpu_shares?: number;
  mem_swappiness?: number;

  pid?: string;
  ipc?: string;
  uts?: string;
  userns_mode?: string;
  cgroup?: string;
  cgroup_parent?: string;
  isolation?: string;
  runtime?: string;

  stop_signal?: string;
  stop_grace_period?: string;
  tty?: boolean;
  stdin_open?: boolean;
  attach?: boolean;
  oom_kill_disable?: boolean;
  oom_score_adj?: number;
  pids_limit?: number;
  storage_opt: Record<string, string>;
  device_cgroup_rules: string[];
  credential_spec?: Record<string, unknown>;
  group_add: string[];
  blkio_config?: Record<string, unknown>;

  labels: Record<string, string>;
  annotations: Record<string, string>;
  extends?: ExtendsConfig;
  post_start: ServiceHook[];
  pre_stop: ServiceHook[];
  provider?: Record<string, unknown>;
  models: Record<string, unknown>;
  volume_driver?: string;
  use_api_socket?: boolean;

  deploy?: DeployConfig;
}

/**
 * Where a secret's payload comes from. A file source takes precedence over
 * inline content when both appear in the compose file.
 */
export type SecretSource =
  | { kind: "inline"; content: string }
  | { kind: "file"; path: string }
  | { kind: "external" };

export interface SecretDefinition {
  name: string;
  source: SecretSource;
}

export interface NetworkConfig {
  name?: string;
  driver?: string;
  external: boolean;
}

export interface Project {
  name: string;
  workingDir: string;
  /** In the order the compose file declares them. */
  services: ServiceConfig[];
  secrets: Record<string, SecretDefinition>;
  networks: Record<string, NetworkConfig>;
}
