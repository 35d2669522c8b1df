import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { InMemoryCloudProvider } from '../../../../test/in-memory-cloud-provider';
import { InMemoryRemoteChannel } from '../../../../test/in-memory-remote-channel';
import { SshConfig } from '../../shared/interfaces';
import { SshCommandService } from '../../shared/services';
import {
  ChunkedFilePusherService,
  PROGRESS_REPORTER,
} from '../../transfer/services';
import { CLOUD_PROVIDER_CLIENT, DeploymentPlan } from '../interfaces';
import { DeploymentService } from './deployment.service';
import {
  INITIALIZE_DATA_DISK_SCRIPT,
  INSTALL_DATABASE_SCRIPT,
  INSTALL_WEB_SERVER_SCRIPT,
} from './provisioning.scripts';

describe('DeploymentService', () => {
  let service: DeploymentService;
  let provider: InMemoryCloudProvider;
  let frontChannel: InMemoryRemoteChannel;
  let backChannel: InMemoryRemoteChannel;
  let tmpDir: string;
  let installer: Buffer;
  let plan: DeploymentPlan;

  beforeEach(async () => {
    tmpDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'deployment-'));
    installer = Buffer.from('database installer package bytes!');
    const installerPath = path.join(tmpDir, 'database.deb');
    await fs.promises.writeFile(installerPath, installer);

    provider = new InMemoryCloudProvider();
    frontChannel = new InMemoryRemoteChannel('shop-web.cloudapp.test', '/home/webadmin');
    backChannel = new InMemoryRemoteChannel('shop-db.cloudapp.test', '/home/dbadmin');
    const channels = new Map([
      [frontChannel.host, frontChannel],
      [backChannel.host, backChannel],
    ]);

    const moduleRef = await Test.createTestingModule({
      providers: [
        DeploymentService,
        ChunkedFilePusherService,
        { provide: CLOUD_PROVIDER_CLIENT, useValue: provider },
        {
          provide: SshCommandService,
          useValue: {
            openChannel: async (access: SshConfig) => {
              const channel = channels.get(access.host);
              if (!channel) {
                throw new Error(`No channel for ${access.host}`);
              }
              return channel;
            },
          },
        },
        {
          provide: ConfigService,
          useValue: new ConfigService({
            deployment: {
              location: 'North Europe',
              webServerPackage: 'nginx',
              databaseInstallerRemotePath: 'installers/database.deb',
              dataDiskDevice: '/dev/sdc',
              dataMount: '/srv/data',
            },
          }),
        },
        { provide: PROGRESS_REPORTER, useValue: { report: jest.fn() } },
      ],
    }).compile();

    service = moduleRef.get(DeploymentService);

    plan = {
      affinityGroup: { name: 'shop-ag' },
      virtualNetwork: {
        name: 'shop-vnet',
        addressSpace: '10.0.0.0/16',
        subnet: { name: 'app', addressPrefix: '10.0.1.0/24' },
      },
      frontEnd: {
        name: 'shop-web',
        serviceName: 'shop-web',
        imageFamily: 'Ubuntu 22.04 LTS',
        instanceSize: 'Small',
        adminUsername: 'webadmin',
      },
      backEnd: {
        name: 'shop-db',
        serviceName: 'shop-db',
        imageFamily: 'Ubuntu 22.04 LTS',
        instanceSize: 'Medium',
        adminUsername: 'dbadmin',
        databaseInstaller: { localPath: installerPath },
        dataDisk: { sizeGb: 50 },
      },
      blockSize: 8,
    };
  });

  afterEach(async () => {
    await fs.promises.rm(tmpDir, { recursive: true, force: true });
  });

  it('provisions both tiers on one subnet from scratch', async () => {
    const result = await service.deploy(plan);

    expect(result.error).toBeUndefined();
    expect(result.success).toBe(true);
    expect(Object.values(result.steps).every(Boolean)).toBe(true);
    expect(provider.calls).toEqual([
      'getAffinityGroup shop-ag',
      'createAffinityGroup shop-ag',
      'getVirtualNetworkSite shop-vnet',
      'setVirtualNetworkSite shop-vnet',
      'findImage Ubuntu 22.04 LTS',
      'createVirtualMachine shop-web',
      'getRemoteAccess shop-web',
      'findImage Ubuntu 22.04 LTS',
      'createVirtualMachine shop-db',
      'getRemoteAccess shop-db',
    ]);
    expect(provider.affinityGroups.get('shop-ag')).toEqual({
      name: 'shop-ag',
      location: 'North Europe',
      description: undefined,
    });
    expect(provider.sites.get('shop-vnet')).toEqual({
      name: 'shop-vnet',
      affinityGroup: 'shop-ag',
      addressSpace: ['10.0.0.0/16'],
      subnets: [{ name: 'app', addressPrefix: '10.0.1.0/24' }],
    });
    expect(result.frontEnd).toEqual({
      name: 'shop-web',
      serviceName: 'shop-web',
      privateAddress: '10.0.1.4',
    });
    expect(result.backEnd?.privateAddress).toBe('10.0.1.5');
    expect(provider.machines.get('shop-db')?.dataDiskSizeGb).toBe(50);
    expect(provider.machines.get('shop-web')?.subnet).toBe('app');
  });

  it('installs the web server on the front end', async () => {
    await service.deploy(plan);

    expect(frontChannel.scripts).toEqual([
      { script: INSTALL_WEB_SERVER_SCRIPT, args: ['nginx'] },
    ]);
    expect(frontChannel.closeCount).toBe(1);
  });

  it('prepares the disk, pushes the installer and configures the database', async () => {
    const result = await service.deploy(plan);

    expect(backChannel.scripts).toEqual([
      { script: INITIALIZE_DATA_DISK_SCRIPT, args: ['/dev/sdc', '/srv/data'] },
      {
        script: INSTALL_DATABASE_SCRIPT,
        args: ['installers/database.deb', '10.0.1.5', '/srv/data/database'],
      },
    ]);
    expect(
      backChannel.files.get('/home/dbadmin/installers/database.deb'),
    ).toEqual(installer);
    expect(result.installer?.chunksSent).toBe(5);
    expect(backChannel.appendedPayloadLengths()).toEqual([8, 8, 8, 8, 1]);
    expect(backChannel.closeCount).toBe(1);
  });

  it('reuses an existing affinity group and network site', async () => {
    provider.affinityGroups.set('shop-ag', { name: 'shop-ag', location: 'West US' });
    provider.sites.set('shop-vnet', {
      name: 'shop-vnet',
      affinityGroup: 'shop-ag',
      addressSpace: ['10.0.0.0/16'],
      subnets: [{ name: 'app', addressPrefix: '10.0.1.0/24' }],
    });

    const result = await service.deploy(plan);

    expect(result.success).toBe(true);
    expect(provider.calls).not.toContain('createAffinityGroup shop-ag');
    expect(provider.calls).not.toContain('setVirtualNetworkSite shop-vnet');
  });

  it('adds the subnet to an existing site that lacks it', async () => {
    provider.sites.set('shop-vnet', {
      name: 'shop-vnet',
      affinityGroup: 'shop-ag',
      addressSpace: ['10.0.0.0/16'],
      subnets: [{ name: 'gateway', addressPrefix: '10.0.0.0/24' }],
    });

    await service.deploy(plan);

    expect(provider.sites.get('shop-vnet')?.subnets).toEqual([
      { name: 'gateway', addressPrefix: '10.0.0.0/24' },
      { name: 'app', addressPrefix: '10.0.1.0/24' },
    ]);
  });

  it('stops when the existing subnet has a different prefix', async () => {
    provider.sites.set('shop-vnet', {
      name: 'shop-vnet',
      affinityGroup: 'shop-ag',
      addressSpace: ['10.0.0.0/16'],
      subnets: [{ name: 'app', addressPrefix: '10.0.9.0/24' }],
    });

    const result = await service.deploy(plan);

    expect(result.success).toBe(false);
    expect(result.failedStep).toBe('virtualNetwork');
    expect(result.error).toBe(
      'Subnet app of shop-vnet is 10.0.9.0/24, expected 10.0.1.0/24',
    );
    expect(provider.machines.size).toBe(0);
  });

  it('records a provider error and closes the channels opened so far', async () => {
    provider.machineFailures.set('shop-db', {
      kind: 'quota-exceeded',
      message: 'Core quota reached',
    });

    const result = await service.deploy(plan);

    expect(result.success).toBe(false);
    expect(result.failedStep).toBe('backEndMachine');
    expect(result.error).toBe('backEndMachine: quota-exceeded: Core quota reached');
    expect(result.steps.webServer).toBe(true);
    expect(result.steps.backEndMachine).toBe(false);
    expect(frontChannel.closeCount).toBe(1);
    expect(backChannel.scripts).toEqual([]);
  });

  it('fails the web server step when its script exits non-zero', async () => {
    frontChannel.scriptHandler = () => ({
      exitCode: 100,
      stdout: '',
      stderr: 'E: Unable to locate package nginx',
    });

    const result = await service.deploy(plan);

    expect(result.failedStep).toBe('webServer');
    expect(result.error).toBe(
      'Remote script failed on shop-web.cloudapp.test with code 100: E: Unable to locate package nginx',
    );
    expect(provider.calls).not.toContain('createVirtualMachine shop-db');
  });

  it('fails the upload step when the installer is missing locally', async () => {
    const missing = path.join(tmpDir, 'missing.deb');
    plan.backEnd.databaseInstaller.localPath = missing;

    const result = await service.deploy(plan);

    expect(result.failedStep).toBe('installerUpload');
    expect(result.error).toBe(`Source not found: ${missing}`);
    expect(result.steps.dataDisk).toBe(true);
    expect(backChannel.invocations).toEqual([]);
    expect(backChannel.closeCount).toBe(1);
  });
});
