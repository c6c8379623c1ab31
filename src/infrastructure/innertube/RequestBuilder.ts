import crypto from 'crypto';
import { ContinuationCursor } from '../../domain/entities/ContinuationCursor';
import { isAuthenticated, SessionSnapshot } from '../../domain/entities/SessionContext';
import { OutboundRequest } from '../../domain/ports/IInnertubeTransport';
import { parseCookieHeader } from './cookies';

/**
 * Where an endpoint expects the continuation token.
 *   query: `?continuation=…&ctoken=…` (plus `type` when set)
 *   body:  `{ "continuation": "…" }`
 */
export type ContinuationStyle =
    | { placement: 'query'; type?: string }
    | { placement: 'body' };

/**
 * A logical request before the session envelope is applied.
 */
export interface EndpointRequest {
    endpoint: string;
    /** Logical parameters; left out entirely on continuation requests */
    body: Record<string, unknown>;
    continuation?: ContinuationCursor | null;
    continuationStyle: ContinuationStyle;
}

/**
 * Authorization value for cookie sessions:
 * `SAPISIDHASH <ts>_<sha1("<ts> <SAPISID> <origin>")>`.
 */
export function sapisidHash(sapisid: string, origin: string, timestampSeconds: number): string {
    const digest = crypto
        .createHash('sha1')
        .update(`${timestampSeconds} ${sapisid} ${origin}`)
        .digest('hex');
    return `SAPISIDHASH ${timestampSeconds}_${digest}`;
}

/**
 * Builds requests shaped like the first-party web client's.
 * Any deviation in the envelope makes the upstream silently degrade its
 * answers, so the shape here is kept exact.
 */
export class RequestBuilder {
    private readonly baseUrl: string;
    private readonly now: () => number;

    constructor(baseUrl: string, now: () => number = Date.now) {
        this.baseUrl = baseUrl.replace(/\/+$/, '');
        this.now = now;
    }

    build(request: EndpointRequest, session: SessionSnapshot): OutboundRequest {
        const query: Record<string, string> = { prettyPrint: 'false' };
        const body: Record<string, unknown> = { context: this.buildContext(session) };
        const continuation = request.continuation;

        if (continuation) {
            if (request.continuationStyle.placement === 'query') {
                query.continuation = continuation.token;
                query.ctoken = continuation.token;
                if (request.continuationStyle.type) {
                    query.type = request.continuationStyle.type;
                }
            } else {
                body.continuation = continuation.token;
            }
        } else {
            Object.assign(body, request.body);
        }

        return {
            endpoint: request.endpoint,
            url: `${this.baseUrl}/${request.endpoint}`,
            query,
            headers: this.buildHeaders(session),
            body,
        };
    }

    buildContext(session: SessionSnapshot): Record<string, unknown> {
        const client: Record<string, unknown> = {
            clientName: session.client.clientName,
            clientVersion: session.client.clientVersion,
            hl: session.locale.hl,
            gl: session.locale.gl,
        };
        if (session.visitorData) {
            client.visitorData = session.visitorData;
        }

        return {
            client,
            request: { internalExperimentFlags: [], useSsl: true },
            user: { lockedSafetyMode: false },
        };
    }

    buildHeaders(session: SessionSnapshot): Record<string, string> {
        const { client, locale } = session;
        const headers: Record<string, string> = {
            'Content-Type': 'application/json',
            'Accept-Language': locale.hl,
            'User-Agent': client.userAgent,
            'X-Goog-Api-Format-Version': '1',
            'X-YouTube-Client-Name': client.clientId,
            'X-YouTube-Client-Version': client.clientVersion,
            'X-Origin': client.origin,
            'Referer': `${client.origin}/`,
        };

        if (session.visitorData) {
            headers['X-Goog-Visitor-Id'] = session.visitorData;
        }

        if (session.credentials && isAuthenticated(session)) {
            headers['Cookie'] = session.credentials.cookie;
            headers['X-Goog-AuthUser'] = '0';
            const cookies = parseCookieHeader(session.credentials.cookie);
            const sapisid = cookies.get('SAPISID') ?? cookies.get('__Secure-3PAPISID');
            if (sapisid) {
                headers['Authorization'] = sapisidHash(sapisid, client.origin, Math.floor(this.now() / 1000));
            }
        }

        return headers;
    }
}
