import type { ProvisionStep, StepContext, StepResult } from '@devstrap/core';
import { done, warned } from '@devstrap/core';
import { httpHeadProbe, type NetworkProbe, type ProbeResult } from '../network-probe.js';

export interface NetworkCheckOptions {
  probe?: NetworkProbe;
}

function hostOf(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return url;
  }
}

/**
 * Best-effort reachability probe. Never fails the run: an unreachable host
 * only produces a warning so the user expects slow or failing downloads.
 */
export function createNetworkCheckStep(options: NetworkCheckOptions = {}): ProvisionStep {
  const probe = options.probe ?? httpHeadProbe;

  return {
    id: 'network',
    title: 'Checking network connectivity',
    async run({ config, logger }: StepContext): Promise<StepResult> {
      const { probeUrl, timeoutMs } = config.network;
      const host = hostOf(probeUrl);
      logger.info(`Checking connectivity to ${host}...`);

      let result: ProbeResult;
      try {
        result = await probe(probeUrl, timeoutMs);
      } catch (err) {
        result = { reachable: false, error: err instanceof Error ? err.message : String(err) };
      }

      if (result.reachable) {
        const message = `${host} is accessible.`;
        logger.info(message);
        return done(message);
      }

      const message = `Cannot reach ${host}. Installation may be slow or fail. Consider using a VPN or checking your network.`;
      logger.warn(message);
      if (result.error) logger.debug(`Probe of ${probeUrl} failed: ${result.error}`);
      return warned(message);
    },
  };
}
