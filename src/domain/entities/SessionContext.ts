/**
 * Identity of the first-party client being mimicked.
 */
export interface ClientDescriptor {
    readonly clientName: string;
    readonly clientVersion: string;
    /** Numeric client id sent as X-YouTube-Client-Name */
    readonly clientId: string;
    readonly userAgent: string;
    /** Web origin, also used as the SAPISIDHASH scope */
    readonly origin: string;
}

export interface Locale {
    /** Interface language, e.g. "en" */
    readonly hl: string;
    /** Content region, e.g. "US" */
    readonly gl: string;
}

/**
 * Cookie bundle of a signed-in account.
 */
export interface Credentials {
    readonly cookie: string;
}

/**
 * Immutable view of the session taken once per request.
 */
export interface SessionSnapshot {
    /** Incremented on every committed change */
    readonly version: number;
    readonly client: ClientDescriptor;
    readonly locale: Locale;
    readonly visitorData?: string;
    readonly credentials?: Credentials;
}

/**
 * Server-issued changes observed on one response, applied all-or-nothing.
 */
export interface SessionUpdate {
    visitorData?: string;
    /** Raw Set-Cookie header values */
    setCookies?: string[];
}

export function isAuthenticated(snapshot: SessionSnapshot): boolean {
    return snapshot.credentials !== undefined && snapshot.credentials.cookie.length > 0;
}
