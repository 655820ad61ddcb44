import React from 'react';
import { Box, Text } from 'ink';
import type { LauncherSnapshot } from '@/launcher/types';
import { formatStep, stateLabel } from '@/ui/format';

export interface LaunchProgressProps {
    snapshot: LauncherSnapshot | null;
}

/**
 * Live view of the step log while a lifecycle operation runs
 */
export function LaunchProgress({ snapshot }: LaunchProgressProps): React.ReactElement {
    if (!snapshot) {
        return React.createElement(Text, { color: 'gray' }, 'Connecting to launcher daemon...');
    }

    return React.createElement(
        Box,
        { flexDirection: 'column' },
        ...snapshot.steps.map((step, index) => React.createElement(Text, { key: `${step.at}-${index}` }, formatStep(step))),
        snapshot.pullProgress
            ? React.createElement(Text, { key: 'pull', color: 'gray' }, `  ${snapshot.pullProgress}`)
            : null,
        React.createElement(
            Text,
            { key: 'state', dimColor: true },
            `${stateLabel(snapshot.state)}${snapshot.busy ? '...' : ''}`,
        ),
    );
}
