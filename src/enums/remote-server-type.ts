import { defineFamily } from '../core/family';
import { contextLabel } from '../core/translation';

/** Whether to relay through an existing server or host one locally */
export const RemoteServerType = defineFamily({
    name: 'RemoteServerType',
    kind: 'booleanFlag',
    continuous: true,
    members: { EXISTING: false, LOCAL: true },
    labels: {
        EXISTING: contextLabel('remote', 'Use existing'),
        LOCAL: contextLabel('remote', 'Host locally'),
    },
});
