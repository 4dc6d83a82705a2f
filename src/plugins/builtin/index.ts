import type { WheelsPlugin } from '../types.js';
import { AddServicePlugin } from './add-service.js';
import { DcosAwsPlugin } from './dcos-aws.js';
import { DcosProviderPlugin } from './dcos-provider.js';
import { SshAgentPlugin } from './ssh-agent.js';

export { AddServicePlugin, DcosAwsPlugin, DcosProviderPlugin, SshAgentPlugin };

/**
 * Built-in plugins in registration order. Hooks run and commands are listed
 * in this order.
 */
export function createBuiltinPlugins(): WheelsPlugin[] {
  return [new DcosAwsPlugin(), new SshAgentPlugin(), new AddServicePlugin(), new DcosProviderPlugin()];
}
