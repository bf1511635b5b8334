import {
  ClusterClient,
  DeletedImage,
  MachineInfo,
  MachineResponse,
  PruneFilters,
  PruneReport,
  PullProgressMessage,
} from "./types";
import { logger } from "../utils/logger";

const SIZE_UNITS = ["B", "kB", "MB", "GB", "TB", "PB", "EB", "ZB", "YB"];

/** Decimal (SI) size with four significant digits, e.g. `1.235MB`. */
export function humanSize(bytes: number): string {
  let size = bytes;
  let unit = 0;
  while (size >= 1000 && unit < SIZE_UNITS.length - 1) {
    size /= 1000;
    unit++;
  }
  return `${Number(size.toPrecision(4))}${SIZE_UNITS[unit]}`;
}

/** `["a,b", " c "]` becomes `["a", "b", "c"]`. */
export function expandCommaSeparatedValues(values: string[] = []): string[] {
  return values
    .flatMap((value) => value.split(","))
    .map((value) => value.trim())
    .filter((value) => value.length > 0);
}

export function parsePruneFilters(filters: string[], all: boolean): PruneFilters {
  const result: PruneFilters = {};
  const add = (name: string, value: string) => {
    result[name] = [...(result[name] ?? []), value];
  };

  if (all) add("dangling", "false");
  for (const filter of filters) {
    const eqIdx = filter.indexOf("=");
    if (eqIdx === -1) {
      throw new Error(`invalid filter '${filter}'`);
    }
    add(filter.slice(0, eqIdx), filter.slice(eqIdx + 1));
  }
  return result;
}

/**
 * Maps the machine identifiers found in response envelopes to display names.
 */
export class MachineDirectory {
  constructor(private machines: MachineInfo[]) {}

  find(nameOrId: string): MachineInfo | undefined {
    return (
      this.machines.find((m) => m.id === nameOrId) ??
      this.machines.find((m) => m.name === nameOrId)
    );
  }

  resolveName(nameOrId: string): string {
    return this.find(nameOrId)?.name ?? nameOrId;
  }
}

function envelopeLines<T>(
  responses: MachineResponse<T>[],
  directory: MachineDirectory,
  render: (machine: string, data: T | undefined) => string[],
): string[] {
  return responses.flatMap((resp) => {
    const machine = directory.resolveName(resp.metadata.machine);
    if (resp.metadata.error) {
      return [`[${machine}] Error: ${resp.metadata.error}`];
    }
    return render(machine, resp.data);
  });
}

export function renderPruneReport(
  responses: MachineResponse<PruneReport>[],
  directory: MachineDirectory,
): string[] {
  return envelopeLines(responses, directory, (machine, report) => {
    const lines: string[] = [];
    const deleted = report?.imagesDeleted ?? [];
    if (deleted.length > 0) {
      lines.push(`[${machine}] Deleted Images:`);
      for (const item of deleted) {
        if (item.untagged) lines.push(`untagged: ${item.untagged}`);
        if (item.deleted) lines.push(`deleted: ${item.deleted}`);
      }
      lines.push("");
    }
    lines.push(
      `[${machine}] Total reclaimed space: ${humanSize(report?.spaceReclaimed ?? 0)}`,
    );
    return lines;
  });
}

export function renderRemoveReport(
  image: string,
  responses: MachineResponse<DeletedImage[]>[],
  directory: MachineDirectory,
): string[] {
  return envelopeLines(responses, directory, (machine, items = []) => {
    if (items.length === 0) {
      return [`[${machine}] Image '${image}' not found or not removed.`];
    }
    return items.flatMap((item) => [
      ...(item.untagged ? [`[${machine}] Untagged: ${item.untagged}`] : []),
      ...(item.deleted ? [`[${machine}] Deleted: ${item.deleted}`] : []),
    ]);
  });
}

export function renderInspectReport(
  responses: MachineResponse<unknown>[],
  directory: MachineDirectory,
  remote = false,
): string[] {
  const label = remote ? "Machine (Remote Lookup)" : "Machine";
  return responses.flatMap((resp) => {
    const lines = [`${label}: ${directory.resolveName(resp.metadata.machine)}`];
    if (resp.metadata.error) {
      lines.push(`Error: ${resp.metadata.error}`);
    } else {
      lines.push(JSON.stringify(resp.data ?? null, null, 4));
    }
    return lines;
  });
}

export interface PruneImagesOptions {
  machines?: string[];
  all?: boolean;
  filters?: string[];
}

export async function pruneImages(
  client: ClusterClient,
  options: PruneImagesOptions = {},
): Promise<string[]> {
  const filters = parsePruneFilters(options.filters ?? [], !!options.all);
  const directory = new MachineDirectory(await client.listMachines());
  const responses = await client.pruneImages(
    filters,
    expandCommaSeparatedValues(options.machines),
  );
  return renderPruneReport(responses, directory);
}

export interface RemoveImagesOptions {
  machines?: string[];
  force?: boolean;
  noPrune?: boolean;
}

/**
 * Removes each image in turn. A failed call for one image is reported as a
 * line and does not stop the others.
 */
export async function removeImages(
  client: ClusterClient,
  images: string[],
  options: RemoveImagesOptions = {},
): Promise<string[]> {
  const directory = new MachineDirectory(await client.listMachines());
  const machines = expandCommaSeparatedValues(options.machines);
  const lines: string[] = [];

  for (const image of images) {
    try {
      const responses = await client.removeImage(
        image,
        { force: !!options.force, pruneChildren: !options.noPrune },
        machines,
      );
      lines.push(...renderRemoveReport(image, responses, directory));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      lines.push(`Error removing image '${image}': ${reason}`);
    }
  }
  return lines;
}

/**
 * Inspects images on the cluster machines, falling back to a registry lookup
 * through the machines when the local inspect fails.
 */
export async function inspectImages(
  client: ClusterClient,
  images: string[],
): Promise<string[]> {
  const directory = new MachineDirectory(await client.listMachines());
  const lines: string[] = [];

  for (const image of images) {
    let local: MachineResponse<unknown>[] | undefined;
    try {
      local = await client.inspectImage(image);
    } catch (error) {
      logger.debug(`Inspect of '${image}' on machines failed, trying registry`, error);
    }
    if (local) {
      lines.push(...renderInspectReport(local, directory));
      continue;
    }

    try {
      const remote = await client.inspectRemoteImage(image);
      lines.push(...renderInspectReport(remote, directory, true));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      lines.push(`Error inspecting image '${image}': ${reason}`);
    }
  }
  return lines;
}

export async function tagImage(
  client: ClusterClient,
  source: string,
  target: string,
  machines?: string[],
): Promise<string> {
  await client.tagImage(source, target, expandCommaSeparatedValues(machines));
  return `Tagged ${source} as ${target}`;
}

/** Percent complete for one layer, or undefined when there is no progress. */
export function layerPercent(message: PullProgressMessage): number | undefined {
  if (!message.id || !message.progress) return undefined;
  if (
    message.status === "Pull complete" ||
    message.status === "Already exists" ||
    message.status === "Download complete"
  ) {
    return 100;
  }
  const { current, total } = message.progress;
  if (total <= 0) return 0;
  return Math.min(100, Math.floor((current * 100) / total));
}

/**
 * Drains the pull stream, reporting each message through `onProgress`. The
 * first message carrying an error aborts the pull.
 */
export async function pullImage(
  client: ClusterClient,
  image: string,
  options: { machines?: string[]; allTags?: boolean } = {},
  onProgress: (message: PullProgressMessage) => void = () => undefined,
): Promise<void> {
  const stream = client.pullImage(
    image,
    { allTags: !!options.allTags },
    expandCommaSeparatedValues(options.machines),
  );
  for await (const message of stream) {
    if (message.error) {
      throw new Error(`pull image: ${message.error}`);
    }
    onProgress(message);
  }
}
