import { SshConfig } from '../src/modules/shared/interfaces';
import {
  AffinityGroup,
  CloudProviderClient,
  ImageRef,
  ProviderError,
  ProviderResult,
  ProvisionedMachine,
  VirtualMachineSpec,
  VirtualNetworkSite,
} from '../src/modules/deployment/interfaces';

const ok = <T>(value: T): ProviderResult<T> => ({ ok: true, value });
const failed = <T>(error: ProviderError): ProviderResult<T> => ({ ok: false, error });

/**
 * Provider control plane kept in memory.
 * Machines get consecutive addresses on their subnet, starting at .4.
 */
export class InMemoryCloudProvider implements CloudProviderClient {
  readonly affinityGroups = new Map<string, AffinityGroup>();
  readonly sites = new Map<string, VirtualNetworkSite>();
  readonly machines = new Map<string, VirtualMachineSpec>();
  readonly calls: string[] = [];
  readonly images: ImageRef[] = [
    { name: 'ubuntu-22_04-lts-20260901', family: 'Ubuntu 22.04 LTS' },
  ];
  readonly machineFailures = new Map<string, ProviderError>();

  async getAffinityGroup(name: string): Promise<ProviderResult<AffinityGroup | null>> {
    this.calls.push(`getAffinityGroup ${name}`);
    return ok(this.affinityGroups.get(name) ?? null);
  }

  async createAffinityGroup(group: AffinityGroup): Promise<ProviderResult<AffinityGroup>> {
    this.calls.push(`createAffinityGroup ${group.name}`);
    if (this.affinityGroups.has(group.name)) {
      return failed({ kind: 'conflict', message: `${group.name} exists` });
    }
    this.affinityGroups.set(group.name, group);
    return ok(group);
  }

  async getVirtualNetworkSite(
    name: string,
  ): Promise<ProviderResult<VirtualNetworkSite | null>> {
    this.calls.push(`getVirtualNetworkSite ${name}`);
    return ok(this.sites.get(name) ?? null);
  }

  async setVirtualNetworkSite(
    site: VirtualNetworkSite,
  ): Promise<ProviderResult<VirtualNetworkSite>> {
    this.calls.push(`setVirtualNetworkSite ${site.name}`);
    this.sites.set(site.name, site);
    return ok(site);
  }

  async findImage(family: string): Promise<ProviderResult<ImageRef>> {
    this.calls.push(`findImage ${family}`);
    const image = this.images.find((candidate) => candidate.family === family);
    return image
      ? ok(image)
      : failed({ kind: 'not-found', message: `No image in family ${family}` });
  }

  async createVirtualMachine(
    spec: VirtualMachineSpec,
  ): Promise<ProviderResult<ProvisionedMachine>> {
    this.calls.push(`createVirtualMachine ${spec.name}`);
    const failure = this.machineFailures.get(spec.name);
    if (failure) {
      return failed(failure);
    }

    const site = this.sites.get(spec.virtualNetwork);
    const subnet = site?.subnets.find((candidate) => candidate.name === spec.subnet);
    if (!subnet) {
      return failed({
        kind: 'not-found',
        message: `Subnet ${spec.subnet} not found in ${spec.virtualNetwork}`,
      });
    }

    const onSubnet = [...this.machines.values()].filter(
      (machine) => machine.subnet === spec.subnet,
    ).length;
    const network = subnet.addressPrefix.split('/')[0].split('.').slice(0, 3);
    this.machines.set(spec.name, spec);

    return ok({
      name: spec.name,
      serviceName: spec.serviceName,
      privateAddress: [...network, String(4 + onSubnet)].join('.'),
    });
  }

  async getRemoteAccess(
    machine: ProvisionedMachine,
    adminUsername: string,
  ): Promise<ProviderResult<SshConfig>> {
    this.calls.push(`getRemoteAccess ${machine.name}`);
    return ok({
      host: `${machine.serviceName}.cloudapp.test`,
      port: 22,
      username: adminUsername,
      password: 'test-secret',
    });
  }
}
