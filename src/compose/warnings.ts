import { DeployConfig, Project, ServiceConfig } from "./types";
import { DEFAULT_NETWORK } from "./normalizer";

export interface Warning {
  /** Empty for project-level warnings. */
  service: string;
  key: string;
  message: string;
}

export interface WarningRule<T> {
  key: string;
  message: string;
  applies: (subject: T, project: Project) => boolean;
}

export function formatWarning(warning: Warning): string {
  if (warning.service === "") {
    return warning.message;
  }
  return `service '${warning.service}': ${warning.message}`;
}

const isSet = (value: string | undefined): boolean =>
  value !== undefined && value !== "";

const notEmpty = (value: readonly unknown[]): boolean => value.length > 0;

const hasEntries = (value: object): boolean => Object.keys(value).length > 0;

const positive = (value: number | undefined): boolean =>
  value !== undefined && value > 0;

const nonZero = (value: number | undefined): boolean =>
  value !== undefined && value !== 0;

function rule(
  key: string,
  applies: WarningRule<ServiceConfig>["applies"],
  hint?: string,
): WarningRule<ServiceConfig> {
  const message = `'${key}' is not supported.` + (hint ? ` ${hint}` : "");
  return { key, message, applies };
}

function deployRule(
  key: string,
  applies: WarningRule<DeployConfig>["applies"],
  hint?: string,
): WarningRule<DeployConfig> {
  const fullKey = `deploy.${key}`;
  const message = `'${fullKey}' is not supported.` + (hint ? ` ${hint}` : "");
  return { key: fullKey, message, applies };
}

/**
 * True when the service joins a network other than the implicit project
 * network. The loader attaches every service without networks to `default`,
 * which must never be reported.
 */
export function hasUserDefinedNetworks(
  service: ServiceConfig,
  project: Project,
): boolean {
  return Object.keys(service.networks).some(
    (network) => network !== project.name && network !== DEFAULT_NETWORK,
  );
}

export const SERVICE_WARNING_RULES: readonly WarningRule<ServiceConfig>[] = [
  rule(
    "build",
    (s) => s.build !== undefined,
    "Pre-build images and specify 'image' instead.",
  ),
  rule(
    "container_name",
    (s) => isSet(s.container_name),
    "Container names are generated automatically.",
  ),
  // The loader derives depends_on from links; those are reported under 'links'
  rule(
    "depends_on",
    (s) => hasEntries(s.depends_on) && s.links.length === 0,
    "Services start independently.",
  ),
  rule(
    "networks",
    (s, project) => hasUserDefinedNetworks(s, project),
    "Services share a flat mesh network with built-in service discovery.",
  ),
  rule(
    "network_mode",
    (s) => isSet(s.network_mode) && s.network_mode !== DEFAULT_NETWORK,
    "Services share a flat mesh network.",
  ),
  rule(
    "restart",
    (s) => isSet(s.restart),
    "Container lifecycle is managed automatically.",
  ),
  rule(
    "secrets",
    (s) => notEmpty(s.secrets),
    "Use environment variables or configs instead.",
  ),
  rule(
    "profiles",
    (s) => notEmpty(s.profiles),
    "Specify services explicitly during deploy.",
  ),
  {
    key: "links",
    message:
      "'links' is deprecated and not supported. Use service names for discovery.",
    applies: (s) => notEmpty(s.links),
  },
  {
    key: "external_links",
    message: "'external_links' is deprecated and not supported.",
    applies: (s) => notEmpty(s.external_links),
  },
  rule(
    "volumes_from",
    (s) => notEmpty(s.volumes_from),
    "Define volumes explicitly.",
  ),
  rule(
    "develop",
    (s) => s.develop !== undefined,
    "This is a development-only feature.",
  ),
  rule(
    "hostname",
    (s) => isSet(s.hostname),
    "Use the service name for DNS resolution.",
  ),
  rule("dns", (s) => notEmpty(s.dns), "Built-in DNS is always used."),
  rule("dns_opt", (s) => notEmpty(s.dns_opt)),
  rule("dns_search", (s) => notEmpty(s.dns_search)),
  rule("extra_hosts", (s) => notEmpty(s.extra_hosts)),
  rule("security_opt", (s) => notEmpty(s.security_opt)),
  rule("platform", (s) => isSet(s.platform)),
  rule("working_dir", (s) => isSet(s.working_dir)),
  {
    key: "tmpfs",
    message:
      "'tmpfs' at service level is not supported. Use volumes with tmpfs type instead.",
    applies: (s) => notEmpty(s.tmpfs),
  },
  rule("read_only", (s) => s.read_only === true),
  rule("shm_size", (s) => positive(s.shm_size)),
  rule("cpuset", (s) => isSet(s.cpuset)),
  rule("memswap_limit", (s) => positive(s.memswap_limit)),
  rule("pid", (s) => isSet(s.pid)),
  rule("ipc", (s) => isSet(s.ipc)),
  rule("uts", (s) => isSet(s.uts)),
  rule("userns_mode", (s) => isSet(s.userns_mode)),
  rule("cgroup_parent", (s) => isSet(s.cgroup_parent)),
  rule("cgroup", (s) => isSet(s.cgroup)),
  rule("isolation", (s) => isSet(s.isolation)),
  rule("runtime", (s) => isSet(s.runtime)),
  rule("stop_signal", (s) => isSet(s.stop_signal)),
  rule("stop_grace_period", (s) => s.stop_grace_period !== undefined),
  rule("mac_address", (s) => isSet(s.mac_address)),
  rule("tty", (s) => s.tty === true),
  rule("stdin_open", (s) => s.stdin_open === true),
  rule("oom_kill_disable", (s) => s.oom_kill_disable === true),
  rule("oom_score_adj", (s) => nonZero(s.oom_score_adj)),
  rule("pids_limit", (s) => nonZero(s.pids_limit)),
  rule("storage_opt", (s) => hasEntries(s.storage_opt)),
  rule("device_cgroup_rules", (s) => notEmpty(s.device_cgroup_rules)),
  rule("credential_spec", (s) => s.credential_spec !== undefined),
  rule("group_add", (s) => notEmpty(s.group_add)),
  rule("blkio_config", (s) => s.blkio_config !== undefined),
  rule("cpu_count", (s) => positive(s.cpu_count)),
  rule("cpu_percent", (s) => positive(s.cpu_percent)),
  rule("cpu_period", (s) => positive(s.cpu_period)),
  rule("cpu_quota", (s) => positive(s.cpu_quota)),
  rule("cpu_rt_period", (s) => positive(s.cpu_rt_period)),
  rule("cpu_rt_runtime", (s) => positive(s.cpu_rt_runtime)),
  rule("cpu_shares", (s) => nonZero(s.cpu_shares)),
  rule("mem_swappiness", (s) => positive(s.mem_swappiness)),
  rule("domainname", (s) => isSet(s.domainname)),
  rule("attach", (s) => s.attach === false),
  {
    key: "labels",
    message: "'labels' at service level is not supported.",
    applies: (s) => hasEntries(s.labels),
  },
  rule("annotations", (s) => hasEntries(s.annotations)),
  rule("extends", (s) => s.extends !== undefined),
  rule("post_start", (s) => notEmpty(s.post_start)),
  rule("pre_stop", (s) => notEmpty(s.pre_stop)),
  rule("provider", (s) => s.provider !== undefined),
  rule("models", (s) => hasEntries(s.models)),
  rule("volume_driver", (s) => isSet(s.volume_driver)),
  rule("use_api_socket", (s) => s.use_api_socket === true),
  {
    key: "net",
    message:
      "'net' is deprecated and not supported. Use 'network_mode' instead.",
    applies: (s) => isSet(s.net),
  },
];

// replicas and update_config.order are supported
export const DEPLOY_WARNING_RULES: readonly WarningRule<DeployConfig>[] = [
  deployRule("labels", (d) => hasEntries(d.labels)),
  deployRule("rollback_config", (d) => d.rollback_config !== undefined),
  deployRule(
    "restart_policy",
    (d) => d.restart_policy !== undefined,
    "Container lifecycle is managed automatically.",
  ),
  deployRule("endpoint_mode", (d) => isSet(d.endpoint_mode)),
  deployRule(
    "placement",
    (d) =>
      (d.placement.constraints?.length ?? 0) > 0 ||
      d.placement.preferences.length > 0,
    "Use the 'x-machines' extension for machine placement.",
  ),
  deployRule(
    "update_config.parallelism",
    (d) => d.update_config?.parallelism !== undefined,
  ),
  deployRule("update_config.delay", (d) => positive(d.update_config?.delay)),
  deployRule("update_config.failure_action", (d) =>
    isSet(d.update_config?.failure_action),
  ),
  deployRule("update_config.monitor", (d) =>
    positive(d.update_config?.monitor),
  ),
  deployRule("update_config.max_failure_ratio", (d) =>
    positive(d.update_config?.max_failure_ratio),
  ),
];

function byKey(a: Warning, b: Warning): number {
  if (a.key < b.key) return -1;
  if (a.key > b.key) return 1;
  return 0;
}

function collect<T>(
  rules: readonly WarningRule<T>[],
  subject: T,
  project: Project,
  service: string,
): Warning[] {
  return rules
    .filter((r) => r.applies(subject, project))
    .map((r) => ({ service, key: r.key, message: r.message }));
}

/**
 * Every ignored feature of one service, sorted by key.
 */
export function checkServiceWarnings(
  project: Project,
  service: ServiceConfig,
): Warning[] {
  const warnings = collect(
    SERVICE_WARNING_RULES,
    service,
    project,
    service.name,
  );
  if (service.deploy) {
    warnings.push(
      ...collect(DEPLOY_WARNING_RULES, service.deploy, project, service.name),
    );
  }
  return warnings.sort(byKey);
}

/**
 * Scans every service in project order. Never throws; the result is advisory.
 */
export function checkProjectWarnings(project: Project): Warning[] {
  return project.services.flatMap((service) =>
    checkServiceWarnings(project, service),
  );
}
