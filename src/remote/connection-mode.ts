/** Role this machine takes in a remote-control session */
export const ConnectionMode = {
    LEADER: 'leader',
    FOLLOWER: 'follower',
} as const;

export type ConnectionMode = (typeof ConnectionMode)[keyof typeof ConnectionMode];
