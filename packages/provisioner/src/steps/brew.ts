import * as path from 'node:path';
import type { StepContext } from '@devstrap/core';

/** Where the Homebrew installer puts `brew` on this platform. */
export function brewPrefixExecutable({ env, config }: Pick<StepContext, 'env' | 'config'>): string {
  return path.join(config.packageManager.prefix[env.platform], 'bin', 'brew');
}

/** `brew` as found on the search path, else the platform's install location. */
export async function resolveBrew(ctx: StepContext): Promise<string> {
  return (await ctx.env.which('brew', ctx.fs)) ?? brewPrefixExecutable(ctx);
}
