import type { CommandRunner } from '@/docker/commandRunner';
import { logger } from '@/ui/logger';

export function openCommandFor(url: string, platform: NodeJS.Platform = process.platform): string[] {
    return platform === 'darwin' ? ['open', url] : ['xdg-open', url];
}

/**
 * Opens a URL in the user's browser. Returns false when no opener worked.
 */
export async function openUrl(url: string, runner: CommandRunner, platform: NodeJS.Platform = process.platform): Promise<boolean> {
    const result = await runner.run(openCommandFor(url, platform), { timeoutMs: 10_000 });
    if (result.exitCode !== 0) {
        logger.debug(`[OPEN] Could not open browser (exit ${result.exitCode}): ${result.stderr.trim()}`);
        return false;
    }
    return true;
}
