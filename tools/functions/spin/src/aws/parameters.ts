import { createSsmClient, getParameterValue } from '@cloud-starter/aws-ssm-util';

import type { ParameterStoreGateway } from './gateway';

export function createParameterStoreGateway(region: string): ParameterStoreGateway {
  const ssmClient = createSsmClient(region);
  return {
    getParameter: (name: string) => getParameterValue(name, { region }, ssmClient),
  };
}
