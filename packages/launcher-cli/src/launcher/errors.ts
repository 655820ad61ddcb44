import { configuration } from '@/configuration';
import { describeLaunchFailure, type LaunchFailure, type RemediationAction } from './types';

/**
 * Typed failure thrown inside the launch pipeline and converted to state by the orchestrator
 */
export class LaunchError extends Error {
    constructor(
        readonly failure: LaunchFailure,
        readonly remediation: RemediationAction | null = defaultRemediation(failure),
    ) {
        super(describeLaunchFailure(failure));
        this.name = 'LaunchError';
    }
}

function defaultRemediation(failure: LaunchFailure): RemediationAction | null {
    switch (failure.kind) {
        case 'EngineNotInstalled':
            return { kind: 'openDownloadPage', url: configuration.engineDownloadUrl };
        case 'EngineNotRunning':
            return { kind: 'openEngineApp', path: null };
        default:
            return null;
    }
}
