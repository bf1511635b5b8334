/**
 * Contract of the cluster transport. Every fan-out call returns one envelope
 * per targeted machine; a machine that failed carries `metadata.error` instead
 * of data. The transport itself lives outside this package.
 */

export interface MachineInfo {
  id: string;
  name: string;
  state?: string;
}

export interface ResponseMetadata {
  /** Machine ID or name, as reported by the transport. */
  machine: string;
  error?: string;
}

export interface MachineResponse<T> {
  metadata: ResponseMetadata;
  data?: T;
}

export interface DeletedImage {
  untagged?: string;
  deleted?: string;
}

export interface PruneReport {
  imagesDeleted: DeletedImage[];
  /** Bytes. */
  spaceReclaimed: number;
}

export interface PullProgressMessage {
  id?: string;
  status?: string;
  progress?: { current: number; total: number };
  error?: string;
}

export interface RemoveImageOptions {
  force?: boolean;
  pruneChildren?: boolean;
}

export interface PullImageOptions {
  allTags?: boolean;
}

/** Filter name to values, e.g. `{ dangling: ["false"] }`. */
export type PruneFilters = Record<string, string[]>;

export interface ClusterClient {
  listMachines(filter?: string[]): Promise<MachineInfo[]>;
  pullImage(
    image: string,
    options: PullImageOptions,
    machines: string[],
  ): AsyncIterable<PullProgressMessage>;
  pruneImages(
    filters: PruneFilters,
    machines: string[],
  ): Promise<MachineResponse<PruneReport>[]>;
  tagImage(source: string, target: string, machines: string[]): Promise<void>;
  removeImage(
    image: string,
    options: RemoveImageOptions,
    machines: string[],
  ): Promise<MachineResponse<DeletedImage[]>[]>;
  inspectImage(image: string): Promise<MachineResponse<unknown>[]>;
  inspectRemoteImage(image: string): Promise<MachineResponse<unknown>[]>;
  close(): Promise<void>;
}
