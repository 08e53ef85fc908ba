import { defineConversion } from '../core/conversion';
import { defineFamily, type MemberNameOf } from '../core/family';
import { contextLabel } from '../core/translation';
import { ConnectionMode } from '../remote/connection-mode';

/**
 * Role of this computer in a remote-control session.
 * New roles (e.g. an observer) are appended as the next integer.
 */
export const RemoteConnectionMode = defineFamily({
    name: 'RemoteConnectionMode',
    kind: 'integer',
    continuous: true,
    members: { FOLLOWER: 0, LEADER: 1 },
    labels: {
        FOLLOWER: contextLabel('remote', 'Allow this computer to be controlled'),
        LEADER: contextLabel('remote', 'Control another computer'),
    },
});

const CONNECTION_MODES: { readonly [P in MemberNameOf<typeof RemoteConnectionMode>]: ConnectionMode } = {
    FOLLOWER: ConnectionMode.FOLLOWER,
    LEADER: ConnectionMode.LEADER,
};

/** Connection role the remote client negotiates for a configured mode */
export const toConnectionMode = defineConversion(RemoteConnectionMode, 'ConnectionMode', CONNECTION_MODES);
