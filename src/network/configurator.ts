import { UnsupportedPlatformError } from "../errors";

/**
 * Host-level packet rules that let containers on one machine reach the mesh.
 */
export interface NetworkConfigurator {
  configure(machineIp: string): Promise<void>;
  cleanup(): Promise<void>;
}

export class UnsupportedPlatformConfigurator implements NetworkConfigurator {
  constructor(private platform: string) {}

  async configure(_machineIp: string): Promise<void> {
    throw new UnsupportedPlatformError(this.platform, "configure network");
  }

  async cleanup(): Promise<void> {
    throw new UnsupportedPlatformError(this.platform, "clean up network");
  }
}

export type NetworkConfiguratorFactory = () => NetworkConfigurator;

export function createNetworkConfigurator(
  platform: string,
  implementations: Partial<Record<string, NetworkConfiguratorFactory>> = {},
): NetworkConfigurator {
  const factory = implementations[platform];
  return factory ? factory() : new UnsupportedPlatformConfigurator(platform);
}
