export interface Identity {
    /** Email address the account is registered with */
    email: string;

    /** Password chosen for the new account */
    password: string;
}

export interface AccountProxy {
    /** Whether to route axios requests through this proxy (used by the proxy check and network helpers) */
    proxyAxios: boolean;

    /** Proxy host (hostname or IP, optionally with a scheme such as socks5://) */
    url: string;

    /** Proxy port */
    port: number;

    /** Proxy authentication password */
    password: string;

    /** Proxy authentication username */
    username: string;
}

export type AccountStatus = 'active' | 'failed'

export interface StoredCookie {
    name: string;
    value: string;
    domain: string;
    path: string;
    /** Unix time in seconds, -1 for session cookies */
    expires: number;
    httpOnly: boolean;
    secure: boolean;
    sameSite: 'Strict' | 'Lax' | 'None';
}

export interface StoredOrigin {
    origin: string;
    localStorage: Array<{ name: string; value: string }>;
}

/** Serialized browser storage state; enough to re-open the session without signing up again */
export interface SessionArtifact {
    cookies: StoredCookie[];
    origins: StoredOrigin[];
    capturedAt: string;
}

export interface AccountRecord {
    email: string;
    password: string;

    /** Label of the proxy the account was created through (host:port:username:password) */
    proxy: string;

    session: SessionArtifact;
    createdAt: string;
    updatedAt: string;
    status: AccountStatus;
}
