import { SshConfig } from '../../shared/interfaces';

/** Injection token for the provider binding registered by the host application */
export const CLOUD_PROVIDER_CLIENT = Symbol('CLOUD_PROVIDER_CLIENT');

export type ProviderErrorKind =
  | 'not-found'
  | 'conflict'
  | 'quota-exceeded'
  | 'unavailable'
  | 'unknown';

export interface ProviderError {
  kind: ProviderErrorKind;
  message: string;
}

/**
 * Every provider call resolves to a value or a tagged error; it never throws
 * for an outcome the control plane reported.
 */
export type ProviderResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ProviderError };

export interface AffinityGroup {
  name: string;
  location: string;
  description?: string;
}

export interface Subnet {
  name: string;
  addressPrefix: string;
}

export interface VirtualNetworkSite {
  name: string;
  affinityGroup: string;
  addressSpace: string[];
  subnets: Subnet[];
}

export interface ImageRef {
  name: string;
  family: string;
}

export interface VirtualMachineSpec {
  name: string;
  serviceName: string;
  imageName: string;
  instanceSize: string;
  affinityGroup: string;
  virtualNetwork: string;
  subnet: string;
  adminUsername: string;
  adminPassword?: string;
  /** Attach an empty data disk of this size */
  dataDiskSizeGb?: number;
}

export interface ProvisionedMachine {
  name: string;
  serviceName: string;
  /** Address on the private subnet */
  privateAddress: string;
}

/**
 * Cloud provider control plane, as seen by the deployment workflow
 */
export interface CloudProviderClient {
  /** Resolves to null when no group has that name */
  getAffinityGroup(name: string): Promise<ProviderResult<AffinityGroup | null>>;
  createAffinityGroup(group: AffinityGroup): Promise<ProviderResult<AffinityGroup>>;

  /** Resolves to null when no site has that name */
  getVirtualNetworkSite(
    name: string,
  ): Promise<ProviderResult<VirtualNetworkSite | null>>;
  /** Create or replace the site definition */
  setVirtualNetworkSite(
    site: VirtualNetworkSite,
  ): Promise<ProviderResult<VirtualNetworkSite>>;

  /** Latest image of a family */
  findImage(family: string): Promise<ProviderResult<ImageRef>>;
  createVirtualMachine(
    spec: VirtualMachineSpec,
  ): Promise<ProviderResult<ProvisionedMachine>>;

  /** SSH endpoint and credentials for an administrator of the machine */
  getRemoteAccess(
    machine: ProvisionedMachine,
    adminUsername: string,
  ): Promise<ProviderResult<SshConfig>>;
}
