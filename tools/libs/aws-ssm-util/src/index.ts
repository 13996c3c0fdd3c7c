import { GetParameterCommand, SSMClient } from '@aws-sdk/client-ssm';

export interface ParameterOptions {
  region?: string;
  decrypt?: boolean;
}

export function createSsmClient(region?: string): SSMClient {
  return new SSMClient({ region: region ?? process.env.AWS_REGION });
}

/**
 * Read a single parameter value.
 *
 * @remarks
 * Returns `undefined` when the parameter exists but carries no value. A parameter that does
 * not exist surfaces as the SDK's `ParameterNotFound` error, untouched, so callers can map it.
 */
export async function getParameterValue(
  parameter_name: string,
  options: ParameterOptions = {},
  ssmClient: SSMClient = createSsmClient(options.region),
): Promise<string | undefined> {
  const response = await ssmClient.send(
    new GetParameterCommand({
      Name: parameter_name,
      WithDecryption: options.decrypt ?? false,
    }),
  );
  return response.Parameter?.Value;
}

export async function getParameter(parameter_name: string, options: ParameterOptions = {}): Promise<string> {
  const result = await getParameterValue(parameter_name, { decrypt: true, ...options });

  // throw error if result is undefined
  if (!result) {
    throw new Error(`Parameter ${parameter_name} not found`);
  }
  return result;
}
