import { describe, it, expect } from "vitest";
import { ComposeFileSchema } from "./schemas";
import { normalizeProject } from "./normalizer";
import { Project } from "./types";
import {
  checkProjectWarnings,
  checkServiceWarnings,
  DEPLOY_WARNING_RULES,
  formatWarning,
  SERVICE_WARNING_RULES,
  Warning,
} from "./warnings";

function projectFrom(services: Record<string, unknown>, name = "demo"): Project {
  const file = ComposeFileSchema.parse({ services });
  return normalizeProject(file, { name, workingDir: "/srv/demo" });
}

function keysFor(project: Project, service: string): string[] {
  const config = project.services.find((s) => s.name === service);
  if (!config) throw new Error(`no service ${service}`);
  return checkServiceWarnings(project, config).map((w) => w.key);
}

describe("checkServiceWarnings", () => {
  it("should return nothing for a service using supported features only", () => {
    const project = projectFrom({
      web: {
        image: "nginx:1.25",
        ports: ["80:80"],
        environment: { MODE: "prod" },
        deploy: { replicas: 3, update_config: { order: "start-first" } },
      },
    });

    expect(checkServiceWarnings(project, project.services[0])).toEqual([]);
  });

  it("should report ignored keys sorted by key with hints", () => {
    const project = projectFrom({
      web: {
        restart: "always",
        hostname: "web-1",
        container_name: "web",
        build: ".",
      },
    });

    expect(checkServiceWarnings(project, project.services[0])).toEqual([
      {
        service: "web",
        key: "build",
        message: "'build' is not supported. Pre-build images and specify 'image' instead.",
      },
      {
        service: "web",
        key: "container_name",
        message:
          "'container_name' is not supported. Container names are generated automatically.",
      },
      {
        service: "web",
        key: "hostname",
        message:
          "'hostname' is not supported. Use the service name for DNS resolution.",
      },
      {
        service: "web",
        key: "restart",
        message:
          "'restart' is not supported. Container lifecycle is managed automatically.",
      },
    ]);
  });

  it("should interleave service and deploy keys in one sorted list", () => {
    const project = projectFrom({
      web: {
        image: "nginx",
        dns: "8.8.8.8",
        build: ".",
        deploy: { labels: { team: "ops" } },
      },
    });

    expect(keysFor(project, "web")).toEqual(["build", "deploy.labels", "dns"]);
  });

  it("should not report the implicit default network", () => {
    const project = projectFrom({
      implicit: { image: "nginx" },
      explicit: { image: "nginx", networks: ["default"] },
      named: { image: "nginx", networks: { demo: null } },
      custom: { image: "nginx", networks: ["backend"] },
    });

    expect(keysFor(project, "implicit")).toEqual([]);
    expect(keysFor(project, "explicit")).toEqual([]);
    expect(keysFor(project, "named")).toEqual([]);
    expect(keysFor(project, "custom")).toEqual(["networks"]);
  });

  it("should report links without the depends_on entries they imply", () => {
    const project = projectFrom({
      web: { image: "nginx", links: ["db:database"] },
      api: { image: "node", depends_on: ["db"] },
      db: { image: "postgres" },
    });

    expect(checkServiceWarnings(project, project.services[0])).toEqual([
      {
        service: "web",
        key: "links",
        message:
          "'links' is deprecated and not supported. Use service names for discovery.",
      },
    ]);
    expect(keysFor(project, "api")).toEqual(["depends_on"]);
  });

  it("should ignore zero and false values", () => {
    const project = projectFrom({
      web: {
        image: "nginx",
        shm_size: 0,
        cpu_shares: 0,
        oom_score_adj: 0,
        pids_limit: 0,
        read_only: false,
        tty: "false",
        attach: true,
        network_mode: "default",
      },
    });

    expect(keysFor(project, "web")).toEqual([]);
  });

  it("should report attach only when disabled", () => {
    const project = projectFrom({ web: { image: "nginx", attach: false } });

    expect(checkServiceWarnings(project, project.services[0])).toEqual([
      { service: "web", key: "attach", message: "'attach' is not supported." },
    ]);
  });

  it("should use the dedicated messages for deprecated and service-level keys", () => {
    const project = projectFrom({
      web: {
        image: "nginx",
        net: "host",
        tmpfs: "/tmp",
        labels: ["tier=frontend"],
        external_links: ["legacy_db"],
      },
    });

    const messages = checkServiceWarnings(project, project.services[0]).map(
      (w) => w.message,
    );
    expect(messages).toEqual([
      "'external_links' is deprecated and not supported.",
      "'labels' at service level is not supported.",
      "'net' is deprecated and not supported. Use 'network_mode' instead.",
      "'tmpfs' at service level is not supported. Use volumes with tmpfs type instead.",
    ]);
  });

  it("should report unsupported deploy settings", () => {
    const project = projectFrom({
      web: {
        image: "nginx",
        deploy: {
          replicas: 2,
          labels: { team: "ops" },
          restart_policy: { condition: "on-failure" },
          placement: { constraints: ["node.role==manager"] },
          update_config: { parallelism: 0, delay: "10s", order: "stop-first" },
        },
      },
    });

    expect(
      checkServiceWarnings(project, project.services[0]).map((w) => w.message),
    ).toEqual([
      "'deploy.labels' is not supported.",
      "'deploy.placement' is not supported. Use the 'x-machines' extension for machine placement.",
      "'deploy.restart_policy' is not supported. Container lifecycle is managed automatically.",
      "'deploy.update_config.delay' is not supported.",
      "'deploy.update_config.parallelism' is not supported.",
    ]);
  });

  it("should not report placement without constraints or preferences", () => {
    const project = projectFrom({
      web: { image: "nginx", deploy: { placement: { max_replicas_per_node: 1 } } },
    });

    expect(keysFor(project, "web")).toEqual([]);
  });

  it("should return the same result on every call", () => {
    const project = projectFrom({
      web: { image: "nginx", privileged: true, pid: "host", ipc: "host" },
    });
    const service = project.services[0];

    expect(checkServiceWarnings(project, service)).toEqual(
      checkServiceWarnings(project, service),
    );
    expect(keysFor(project, "web")).toEqual(["ipc", "pid"]);
  });
});

// One minimal service fragment per catalogue entry
const TRIGGERS: [string, Record<string, unknown>][] = [
  ["build", { build: "." }],
  ["container_name", { container_name: "web" }],
  ["depends_on", { depends_on: ["db"] }],
  ["networks", { networks: ["backend"] }],
  ["network_mode", { network_mode: "host" }],
  ["restart", { restart: "always" }],
  ["secrets", { secrets: ["api_key"] }],
  ["profiles", { profiles: ["debug"] }],
  ["links", { links: ["db"] }],
  ["external_links", { external_links: ["legacy_db"] }],
  ["volumes_from", { volumes_from: ["data"] }],
  ["develop", { develop: { watch: [] } }],
  ["hostname", { hostname: "web-1" }],
  ["dns", { dns: "8.8.8.8" }],
  ["dns_opt", { dns_opt: ["use-vc"] }],
  ["dns_search", { dns_search: "example.com" }],
  ["extra_hosts", { extra_hosts: ["db:10.0.0.2"] }],
  ["security_opt", { security_opt: ["no-new-privileges:true"] }],
  ["platform", { platform: "linux/amd64" }],
  ["working_dir", { working_dir: "/app" }],
  ["tmpfs", { tmpfs: "/tmp" }],
  ["read_only", { read_only: true }],
  ["shm_size", { shm_size: "64m" }],
  ["cpuset", { cpuset: "0-1" }],
  ["memswap_limit", { memswap_limit: "1g" }],
  ["pid", { pid: "host" }],
  ["ipc", { ipc: "host" }],
  ["uts", { uts: "host" }],
  ["userns_mode", { userns_mode: "host" }],
  ["cgroup_parent", { cgroup_parent: "m-executor" }],
  ["cgroup", { cgroup: "host" }],
  ["isolation", { isolation: "process" }],
  ["runtime", { runtime: "runc" }],
  ["stop_signal", { stop_signal: "SIGUSR1" }],
  ["stop_grace_period", { stop_grace_period: "1m30s" }],
  ["mac_address", { mac_address: "02:42:ac:11:00:02" }],
  ["tty", { tty: true }],
  ["stdin_open", { stdin_open: "true" }],
  ["oom_kill_disable", { oom_kill_disable: true }],
  ["oom_score_adj", { oom_score_adj: -500 }],
  ["pids_limit", { pids_limit: 100 }],
  ["storage_opt", { storage_opt: { size: "20G" } }],
  ["device_cgroup_rules", { device_cgroup_rules: ["c 1:3 mr"] }],
  ["credential_spec", { credential_spec: { file: "spec.json" } }],
  ["group_add", { group_add: ["mail"] }],
  ["blkio_config", { blkio_config: { weight: 300 } }],
  ["cpu_count", { cpu_count: 2 }],
  ["cpu_percent", { cpu_percent: 50 }],
  ["cpu_period", { cpu_period: 100000 }],
  ["cpu_quota", { cpu_quota: "50000" }],
  ["cpu_rt_period", { cpu_rt_period: 1000000 }],
  ["cpu_rt_runtime", { cpu_rt_runtime: "950ms" }],
  ["cpu_shares", { cpu_shares: 512 }],
  ["mem_swappiness", { mem_swappiness: 60 }],
  ["domainname", { domainname: "example.com" }],
  ["attach", { attach: false }],
  ["labels", { labels: { tier: "web" } }],
  ["annotations", { annotations: ["com.example.team=ops"] }],
  ["extends", { extends: "base" }],
  ["post_start", { post_start: [{ command: "./init.sh" }] }],
  ["pre_stop", { pre_stop: [{ command: ["./drain.sh"] }] }],
  ["provider", { provider: { type: "model" } }],
  ["models", { models: ["llm"] }],
  ["volume_driver", { volume_driver: "local" }],
  ["use_api_socket", { use_api_socket: true }],
  ["net", { net: "host" }],
  ["deploy.labels", { deploy: { labels: { team: "ops" } } }],
  ["deploy.rollback_config", { deploy: { rollback_config: { parallelism: 1 } } }],
  ["deploy.restart_policy", { deploy: { restart_policy: { condition: "any" } } }],
  ["deploy.endpoint_mode", { deploy: { endpoint_mode: "dnsrr" } }],
  [
    "deploy.placement",
    { deploy: { placement: { constraints: ["node.role==manager"] } } },
  ],
  [
    "deploy.placement",
    { deploy: { placement: { preferences: [{ spread: "node.labels.zone" }] } } },
  ],
  ["deploy.update_config.parallelism", { deploy: { update_config: { parallelism: 2 } } }],
  ["deploy.update_config.delay", { deploy: { update_config: { delay: "10s" } } }],
  [
    "deploy.update_config.failure_action",
    { deploy: { update_config: { failure_action: "rollback" } } },
  ],
  ["deploy.update_config.monitor", { deploy: { update_config: { monitor: "30s" } } }],
  [
    "deploy.update_config.max_failure_ratio",
    { deploy: { update_config: { max_failure_ratio: 0.1 } } },
  ],
];

describe("warning catalogue", () => {
  it.each(TRIGGERS)("should report %s on its own", (key, fragment) => {
    const project = projectFrom({ web: { image: "nginx", ...fragment } });
    const warnings = checkServiceWarnings(project, project.services[0]);

    expect(warnings.map((w) => w.key)).toEqual([key]);
    expect(warnings[0].message.startsWith(`'${key}' `)).toBe(true);
  });

  it("should have a trigger for every rule", () => {
    const ruleKeys = [...SERVICE_WARNING_RULES, ...DEPLOY_WARNING_RULES].map(
      (r) => r.key,
    );

    expect(new Set(ruleKeys).size).toBe(ruleKeys.length);
    expect([...new Set(TRIGGERS.map(([key]) => key))].sort()).toEqual(
      [...ruleKeys].sort(),
    );
  });
});

describe("checkProjectWarnings", () => {
  it("should follow project service order", () => {
    const project = projectFrom({
      zeta: { image: "nginx", restart: "always" },
      alpha: { image: "nginx", hostname: "a", dns: ["1.1.1.1"] },
    });

    expect(
      checkProjectWarnings(project).map((w) => `${w.service}:${w.key}`),
    ).toEqual(["zeta:restart", "alpha:dns", "alpha:hostname"]);
  });

  it("should return an empty list for a project without services", () => {
    expect(checkProjectWarnings(projectFrom({}))).toEqual([]);
  });
});

describe("formatWarning", () => {
  it("should prefix service warnings with the service name", () => {
    const warning: Warning = {
      service: "web",
      key: "restart",
      message: "'restart' is not supported.",
    };

    expect(formatWarning(warning)).toBe(
      "service 'web': 'restart' is not supported.",
    );
    expect(formatWarning({ ...warning, service: "" })).toBe(
      "'restart' is not supported.",
    );
  });
});
