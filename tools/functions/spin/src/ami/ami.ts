import { createChildLogger } from '@cloud-starter/aws-powertools-util';

import type { RemoteGateways } from '../aws/gateway';
import { InvalidResponseError, translateRemoteError } from '../errors';

const logger = createChildLogger('ami');

/** Public parameter holding the latest Amazon Linux 2023 (kernel 6.1, x86_64) image id. */
export const AMI_PARAMETER_NAME = '/aws/service/ami-amazon-linux-latest/al2023-ami-kernel-6.1-x86_64';
const AMI_ID_PREFIX = 'ami-';

export class AmiResolver {
  constructor(
    private readonly gateways: RemoteGateways,
    private readonly parameterName: string = AMI_PARAMETER_NAME,
  ) {}

  async resolve(region: string): Promise<string> {
    let value: string | undefined;
    try {
      const parameterStore = await this.gateways.parameterStore();
      value = await parameterStore.getParameter(this.parameterName);
    } catch (error) {
      logger.error('Error resolving AMI from SSM', { error, region, parameter: this.parameterName });
      throw translateRemoteError('resolve-ami', error, { region, parameterName: this.parameterName });
    }

    if (!value || !value.startsWith(AMI_ID_PREFIX)) {
      throw new InvalidResponseError(`Invalid AMI ID format returned from SSM: ${value ?? '<empty>'}`);
    }
    logger.debug('Resolved AMI', { amiId: value, region });
    return value;
  }
}
