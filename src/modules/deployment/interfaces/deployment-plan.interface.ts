import { TransferResult } from '../../transfer/interfaces';
import { ProvisionedMachine } from './cloud-provider.interface';

export interface MachinePlan {
  name: string;
  serviceName: string;
  imageFamily: string;
  instanceSize: string;
  adminUsername: string;
  adminPassword?: string;
}

export interface FrontEndPlan extends MachinePlan {
  /** Package installed as the web server (default: `deployment.webServerPackage`) */
  webServerPackage?: string;
}

export interface BackEndPlan extends MachinePlan {
  databaseInstaller: {
    /** Local installer pushed to the back end */
    localPath: string;
    /** Remote path (default: `deployment.databaseInstallerRemotePath`) */
    remotePath?: string;
  };
  dataDisk: {
    sizeGb: number;
    /** Block device (default: `deployment.dataDiskDevice`) */
    device?: string;
    /** Mount point holding the database files (default: `deployment.dataMount`) */
    mountPoint?: string;
  };
}

/**
 * Deployment Plan Interface
 * Both machines land in the same affinity group, network site and subnet
 */
export interface DeploymentPlan {
  affinityGroup: {
    name: string;
    /** Default: `deployment.location` */
    location?: string;
    description?: string;
  };
  virtualNetwork: {
    name: string;
    addressSpace: string;
    subnet: { name: string; addressPrefix: string };
  };
  frontEnd: FrontEndPlan;
  backEnd: BackEndPlan;
  /** Block size for the installer push */
  blockSize?: number;
}

export interface DeploymentSteps {
  affinityGroup: boolean;
  virtualNetwork: boolean;
  frontEndMachine: boolean;
  webServer: boolean;
  backEndMachine: boolean;
  dataDisk: boolean;
  installerUpload: boolean;
  database: boolean;
}

export type DeploymentStep = keyof DeploymentSteps;

/**
 * Deployment Result Interface
 */
export interface DeploymentResult {
  success: boolean;
  steps: DeploymentSteps;
  frontEnd?: ProvisionedMachine;
  backEnd?: ProvisionedMachine;
  installer?: TransferResult;
  failedStep?: DeploymentStep;
  error?: string;
  /** Duration in seconds */
  duration: number;
}
