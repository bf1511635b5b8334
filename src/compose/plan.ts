import { SecretMount, SecretSpec, validateSecretsAndMounts } from "../api/secret";
import { Project, ServiceConfig } from "./types";
import { checkProjectWarnings, Warning } from "./warnings";
import { resolveServiceSecrets } from "./secrets";
import { ServiceNotFoundError, ServicePlanError } from "../errors";

export interface ServicePlan {
  name: string;
  image?: string;
  replicas: number;
  secrets: SecretSpec[];
  secretMounts: SecretMount[];
}

export interface DeploymentPlan {
  project: string;
  warnings: Warning[];
  services: ServicePlan[];
}

export interface PlanOptions {
  /** Restricts the plan to these services; project order is kept. */
  services?: string[];
}

export function selectServices(
  project: Project,
  names?: string[],
): ServiceConfig[] {
  if (!names || names.length === 0) {
    return project.services;
  }

  const known = project.services.map((s) => s.name);
  for (const name of names) {
    if (!known.includes(name)) {
      throw new ServiceNotFoundError(name, known);
    }
  }
  return project.services.filter((s) => names.includes(s.name));
}

export function planService(project: Project, service: ServiceConfig): ServicePlan {
  try {
    const { specs, mounts } = resolveServiceSecrets(
      project.secrets,
      service.secrets,
      project.workingDir,
    );
    validateSecretsAndMounts(specs, mounts);

    return {
      name: service.name,
      image: service.image,
      replicas: service.deploy?.replicas ?? 1,
      secrets: specs,
      secretMounts: mounts,
    };
  } catch (error) {
    throw new ServicePlanError(service.name, error);
  }
}

/**
 * Builds the deployable view of a project: advisory warnings plus resolved,
 * validated secrets for every selected service. Stops at the first service
 * whose secrets fail to resolve or validate.
 */
export function planDeployment(
  project: Project,
  options: PlanOptions = {},
): DeploymentPlan {
  const selected = selectServices(project, options.services);
  const selectedNames = new Set(selected.map((s) => s.name));

  const warnings = checkProjectWarnings(project).filter((w) =>
    selectedNames.has(w.service),
  );

  return {
    project: project.name,
    warnings,
    services: selected.map((service) => planService(project, service)),
  };
}
