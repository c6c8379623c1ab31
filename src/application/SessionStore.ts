import {
    ClientDescriptor,
    Credentials,
    Locale,
    SessionSnapshot,
    SessionUpdate,
} from '../domain/entities/SessionContext';
import { mergeSetCookies } from '../infrastructure/innertube/cookies';

export type SessionListener = (current: SessionSnapshot, previous: SessionSnapshot) => void;

export interface SessionSeed {
    client: ClientDescriptor;
    locale: Locale;
    visitorData?: string;
    credentials?: Credentials;
}

type SessionFields = Omit<SessionSnapshot, 'version'>;

/**
 * Owns the session shared by every in-flight request.
 *
 * Readers take a frozen snapshot per request. Writers replace the snapshot
 * as a whole, so a reader never observes a half-applied change.
 */
export class SessionStore {
    private current: SessionSnapshot;
    private readonly listeners = new Set<SessionListener>();

    constructor(seed: SessionSeed) {
        this.current = Object.freeze({
            version: 0,
            client: Object.freeze({ ...seed.client }),
            locale: Object.freeze({ ...seed.locale }),
            visitorData: seed.visitorData || undefined,
            credentials: seed.credentials?.cookie ? Object.freeze({ ...seed.credentials }) : undefined,
        });
    }

    snapshot(): SessionSnapshot {
        return this.current;
    }

    getLocale(): Locale {
        return this.current.locale;
    }

    setLocale(locale: Locale): void {
        this.replace({ ...this.current, locale: Object.freeze({ ...locale }) });
    }

    getVisitorData(): string | undefined {
        return this.current.visitorData;
    }

    setVisitorData(visitorData: string | undefined): void {
        this.replace({ ...this.current, visitorData: visitorData || undefined });
    }

    getCredentials(): Credentials | undefined {
        return this.current.credentials;
    }

    setCredentials(credentials: Credentials): void {
        this.replace({
            ...this.current,
            credentials: credentials.cookie ? Object.freeze({ ...credentials }) : undefined,
        });
    }

    clearCredentials(): void {
        this.replace({ ...this.current, credentials: undefined });
    }

    /**
     * Applies server-issued changes on top of the latest snapshot.
     * Rotated cookies only touch an existing cookie bundle; an anonymous
     * session never becomes signed in through a response.
     * @returns whether anything changed
     */
    commit(update: SessionUpdate): boolean {
        const base = this.current;
        let visitorData = base.visitorData;
        let credentials = base.credentials;

        if (update.visitorData && update.visitorData !== base.visitorData) {
            visitorData = update.visitorData;
        }

        if (credentials && update.setCookies && update.setCookies.length > 0) {
            const cookie = mergeSetCookies(credentials.cookie, update.setCookies);
            if (cookie !== credentials.cookie) {
                credentials = cookie ? Object.freeze({ cookie }) : undefined;
            }
        }

        if (visitorData === base.visitorData && credentials === base.credentials) {
            return false;
        }

        this.replace({ ...base, visitorData, credentials });
        return true;
    }

    /**
     * Applies `change` only if nobody committed since `expectedVersion` was read.
     */
    compareAndSwap(expectedVersion: number, change: (current: SessionSnapshot) => Partial<SessionFields>): boolean {
        if (this.current.version !== expectedVersion) return false;
        this.replace({ ...this.current, ...change(this.current) });
        return true;
    }

    /**
     * @returns a function that removes the listener
     */
    onChange(listener: SessionListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    private replace(fields: SessionFields): void {
        const previous = this.current;
        this.current = Object.freeze({
            version: previous.version + 1,
            client: fields.client,
            locale: fields.locale,
            visitorData: fields.visitorData,
            credentials: fields.credentials,
        });

        for (const listener of this.listeners) {
            try {
                listener(this.current, previous);
            } catch (error: unknown) {
                console.error('[Session] Change listener failed:', error);
            }
        }
    }
}
