import { DeploymentStep, ProviderErrorKind } from '../interfaces';

/**
 * A deployment step failed; the run stops there
 */
export class DeploymentStepError extends Error {
  readonly code = 'DEPLOYMENT_STEP';

  constructor(
    readonly step: DeploymentStep,
    message: string,
    readonly kind: ProviderErrorKind | 'remote-script' = 'unknown',
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'DeploymentStepError';
  }
}
