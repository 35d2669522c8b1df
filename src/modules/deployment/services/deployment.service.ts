import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RemoteChannel } from '../../shared/interfaces';
import { SshCommandService } from '../../shared/services';
import { ChunkedFilePusherService } from '../../transfer/services';
import { DeploymentStepError } from '../errors';
import {
  AffinityGroup,
  CLOUD_PROVIDER_CLIENT,
  CloudProviderClient,
  DeploymentPlan,
  DeploymentResult,
  DeploymentStep,
  MachinePlan,
  ProviderResult,
  ProvisionedMachine,
  VirtualNetworkSite,
} from '../interfaces';
import {
  INITIALIZE_DATA_DISK_SCRIPT,
  INSTALL_DATABASE_SCRIPT,
  INSTALL_WEB_SERVER_SCRIPT,
} from './provisioning.scripts';

/**
 * Deployment Service
 * Provisions a front-end web server and a back-end database server on one
 * private subnet, one provider call or remote script at a time.
 */
@Injectable()
export class DeploymentService {
  private readonly logger = new Logger(DeploymentService.name);

  constructor(
    private readonly configService: ConfigService,
    @Inject(CLOUD_PROVIDER_CLIENT)
    private readonly provider: CloudProviderClient,
    private readonly sshCommandService: SshCommandService,
    private readonly chunkedFilePusher: ChunkedFilePusherService,
  ) {}

  /**
   * Run the whole deployment; stops at the first failing step
   * @returns Result with one flag per completed step
   */
  async deploy(plan: DeploymentPlan): Promise<DeploymentResult> {
    const startTime = Date.now();
    const result: DeploymentResult = {
      success: false,
      steps: {
        affinityGroup: false,
        virtualNetwork: false,
        frontEndMachine: false,
        webServer: false,
        backEndMachine: false,
        dataDisk: false,
        installerUpload: false,
        database: false,
      },
      duration: 0,
    };
    const channels: RemoteChannel[] = [];
    let step: DeploymentStep = 'affinityGroup';

    try {
      this.logger.log(`Step 1: Ensuring affinity group ${plan.affinityGroup.name}`);
      await this.ensureAffinityGroup(plan);
      result.steps.affinityGroup = true;

      step = 'virtualNetwork';
      this.logger.log(
        `Step 2: Ensuring virtual network ${plan.virtualNetwork.name} / ${plan.virtualNetwork.subnet.name}`,
      );
      await this.ensureVirtualNetworkSite(plan);
      result.steps.virtualNetwork = true;

      step = 'frontEndMachine';
      this.logger.log(`Step 3: Provisioning front end ${plan.frontEnd.name}`);
      const frontEnd = await this.provisionMachine(step, plan, plan.frontEnd);
      result.frontEnd = frontEnd;
      result.steps.frontEndMachine = true;

      step = 'webServer';
      const webServerPackage =
        plan.frontEnd.webServerPackage ??
        this.configService.get<string>('deployment.webServerPackage') ??
        'nginx';
      this.logger.log(`Step 4: Installing ${webServerPackage} on ${plan.frontEnd.name}`);
      const frontChannel = await this.openChannel(step, frontEnd, plan.frontEnd);
      channels.push(frontChannel);
      await this.runScript(step, frontChannel, INSTALL_WEB_SERVER_SCRIPT, [
        webServerPackage,
      ]);
      result.steps.webServer = true;

      step = 'backEndMachine';
      this.logger.log(`Step 5: Provisioning back end ${plan.backEnd.name}`);
      const backEnd = await this.provisionMachine(step, plan, plan.backEnd);
      result.backEnd = backEnd;
      result.steps.backEndMachine = true;

      step = 'dataDisk';
      const device =
        plan.backEnd.dataDisk.device ??
        this.configService.get<string>('deployment.dataDiskDevice') ??
        '/dev/sdc';
      const mountPoint =
        plan.backEnd.dataDisk.mountPoint ??
        this.configService.get<string>('deployment.dataMount') ??
        '/srv/data';
      this.logger.log(`Step 6: Initializing ${device} at ${mountPoint} on ${backEnd.name}`);
      const backChannel = await this.openChannel(step, backEnd, plan.backEnd);
      channels.push(backChannel);
      await this.runScript(step, backChannel, INITIALIZE_DATA_DISK_SCRIPT, [
        device,
        mountPoint,
      ]);
      result.steps.dataDisk = true;

      step = 'installerUpload';
      const installerPath =
        plan.backEnd.databaseInstaller.remotePath ??
        this.configService.get<string>('deployment.databaseInstallerRemotePath') ??
        'installers/database.deb';
      this.logger.log(`Step 7: Pushing database installer to ${backEnd.name}:${installerPath}`);
      result.installer = await this.chunkedFilePusher.push(
        {
          sourcePath: plan.backEnd.databaseInstaller.localPath,
          destinationPath: installerPath,
          remoteTarget: backChannel,
        },
        {
          blockSize: plan.blockSize,
          activity: `Database installer → ${backEnd.name}`,
        },
      );
      result.steps.installerUpload = true;

      step = 'database';
      const dataDirectory = `${mountPoint.replace(/\/+$/, '')}/database`;
      this.logger.log(
        `Step 8: Installing database on ${backEnd.name}, listening on ${backEnd.privateAddress}`,
      );
      await this.runScript(step, backChannel, INSTALL_DATABASE_SCRIPT, [
        installerPath,
        backEnd.privateAddress,
        dataDirectory,
      ]);
      result.steps.database = true;

      result.success = true;
      this.logger.log(
        `✅ Deployment complete: ${frontEnd.name} (${frontEnd.privateAddress}) → ${backEnd.name} (${backEnd.privateAddress})`,
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      result.failedStep = step;
      result.error = message;
      this.logger.error(`❌ Deployment failed at ${step}: ${message}`);
    } finally {
      await this.closeChannels(channels);
      result.duration = (Date.now() - startTime) / 1000;
    }

    return result;
  }

  /**
   * Create the affinity group unless one with that name exists
   */
  private async ensureAffinityGroup(plan: DeploymentPlan): Promise<AffinityGroup> {
    const { name } = plan.affinityGroup;
    const existing = this.unwrap(
      'affinityGroup',
      await this.provider.getAffinityGroup(name),
    );
    if (existing) {
      this.logger.log(`Affinity group ${name} already exists (${existing.location})`);
      return existing;
    }

    const location =
      plan.affinityGroup.location ??
      this.configService.get<string>('deployment.location') ??
      'West Europe';
    const created = this.unwrap(
      'affinityGroup',
      await this.provider.createAffinityGroup({
        name,
        location,
        description: plan.affinityGroup.description,
      }),
    );
    this.logger.log(`Created affinity group ${name} in ${location}`);
    return created;
  }

  /**
   * Create the network site, or add the subnet to an existing one.
   * An existing subnet with a different prefix is a conflict.
   */
  private async ensureVirtualNetworkSite(
    plan: DeploymentPlan,
  ): Promise<VirtualNetworkSite> {
    const { name, addressSpace, subnet } = plan.virtualNetwork;
    const existing = this.unwrap(
      'virtualNetwork',
      await this.provider.getVirtualNetworkSite(name),
    );

    if (!existing) {
      const created = this.unwrap(
        'virtualNetwork',
        await this.provider.setVirtualNetworkSite({
          name,
          affinityGroup: plan.affinityGroup.name,
          addressSpace: [addressSpace],
          subnets: [subnet],
        }),
      );
      this.logger.log(`Created virtual network ${name} (${addressSpace})`);
      return created;
    }

    const current = existing.subnets.find((s) => s.name === subnet.name);
    if (current) {
      if (current.addressPrefix !== subnet.addressPrefix) {
        throw new DeploymentStepError(
          'virtualNetwork',
          `Subnet ${subnet.name} of ${name} is ${current.addressPrefix}, expected ${subnet.addressPrefix}`,
          'conflict',
        );
      }
      this.logger.log(`Virtual network ${name} already has subnet ${subnet.name}`);
      return existing;
    }

    const updated = this.unwrap(
      'virtualNetwork',
      await this.provider.setVirtualNetworkSite({
        ...existing,
        addressSpace: existing.addressSpace.includes(addressSpace)
          ? existing.addressSpace
          : [...existing.addressSpace, addressSpace],
        subnets: [...existing.subnets, subnet],
      }),
    );
    this.logger.log(`Added subnet ${subnet.name} to virtual network ${name}`);
    return updated;
  }

  private async provisionMachine(
    step: DeploymentStep,
    plan: DeploymentPlan,
    machine: MachinePlan & { dataDisk?: { sizeGb: number } },
  ): Promise<ProvisionedMachine> {
    const image = this.unwrap(step, await this.provider.findImage(machine.imageFamily));
    this.logger.log(`[${machine.name}] Using image ${image.name}`);

    const provisioned = this.unwrap(
      step,
      await this.provider.createVirtualMachine({
        name: machine.name,
        serviceName: machine.serviceName,
        imageName: image.name,
        instanceSize: machine.instanceSize,
        affinityGroup: plan.affinityGroup.name,
        virtualNetwork: plan.virtualNetwork.name,
        subnet: plan.virtualNetwork.subnet.name,
        adminUsername: machine.adminUsername,
        adminPassword: machine.adminPassword,
        dataDiskSizeGb: machine.dataDisk?.sizeGb,
      }),
    );
    this.logger.log(
      `[${machine.name}] Provisioned in ${provisioned.serviceName} at ${provisioned.privateAddress}`,
    );
    return provisioned;
  }

  private async openChannel(
    step: DeploymentStep,
    machine: ProvisionedMachine,
    plan: MachinePlan,
  ): Promise<RemoteChannel> {
    const access = this.unwrap(
      step,
      await this.provider.getRemoteAccess(machine, plan.adminUsername),
    );
    return this.sshCommandService.openChannel(access);
  }

  private async runScript(
    step: DeploymentStep,
    channel: RemoteChannel,
    script: string,
    args: string[],
  ): Promise<string> {
    const result = await channel.runScript(script, args);
    if (result.exitCode !== 0) {
      throw new DeploymentStepError(
        step,
        `Remote script failed on ${channel.host} with code ${result.exitCode}: ${result.stderr}`,
        'remote-script',
      );
    }
    return result.stdout;
  }

  private unwrap<T>(step: DeploymentStep, result: ProviderResult<T>): T {
    if (!result.ok) {
      throw new DeploymentStepError(
        step,
        `${step}: ${result.error.kind}: ${result.error.message}`,
        result.error.kind,
      );
    }
    return result.value;
  }

  private async closeChannels(channels: RemoteChannel[]): Promise<void> {
    for (const channel of channels) {
      try {
        await channel.close();
      } catch (error) {
        this.logger.warn(
          `Failed to close channel to ${channel.host}: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }
  }
}
