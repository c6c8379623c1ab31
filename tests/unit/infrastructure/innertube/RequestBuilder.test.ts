import crypto from 'crypto';
import { ContinuationCursor } from '../../../../src/domain/entities/ContinuationCursor';
import { SessionSnapshot } from '../../../../src/domain/entities/SessionContext';
import { RequestBuilder, sapisidHash } from '../../../../src/infrastructure/innertube/RequestBuilder';

const session: SessionSnapshot = {
    version: 0,
    client: {
        clientName: 'WEB_REMIX',
        clientVersion: '1.20241118.01.00',
        clientId: '67',
        userAgent: 'test-agent',
        origin: 'https://music.youtube.com',
    },
    locale: { hl: 'en', gl: 'US' },
};

const NOW = 1700000000000;

describe('RequestBuilder', () => {
    const builder = new RequestBuilder('https://music.youtube.com/youtubei/v1/', () => NOW);

    it('wraps logical params in the client context', () => {
        const request = builder.build(
            { endpoint: 'search', body: { query: 'jazz' }, continuationStyle: { placement: 'query' } },
            session
        );

        expect(request.url).toBe('https://music.youtube.com/youtubei/v1/search');
        expect(request.query).toEqual({ prettyPrint: 'false' });
        expect(request.body).toEqual({
            context: {
                client: { clientName: 'WEB_REMIX', clientVersion: '1.20241118.01.00', hl: 'en', gl: 'US' },
                request: { internalExperimentFlags: [], useSsl: true },
                user: { lockedSafetyMode: false },
            },
            query: 'jazz',
        });
    });

    it('sends the client identity headers', () => {
        const headers = builder.buildHeaders(session);

        expect(headers).toEqual({
            'Content-Type': 'application/json',
            'Accept-Language': 'en',
            'User-Agent': 'test-agent',
            'X-Goog-Api-Format-Version': '1',
            'X-YouTube-Client-Name': '67',
            'X-YouTube-Client-Version': '1.20241118.01.00',
            'X-Origin': 'https://music.youtube.com',
            'Referer': 'https://music.youtube.com/',
        });
    });

    it('carries visitor data in the context and in a header', () => {
        const request = builder.build(
            { endpoint: 'browse', body: { browseId: 'FEmusic_home' }, continuationStyle: { placement: 'query', type: 'next' } },
            { ...session, visitorData: 'visitor-1' }
        );

        expect(request.headers['X-Goog-Visitor-Id']).toBe('visitor-1');
        expect(request.body.context).toMatchObject({ client: { visitorData: 'visitor-1' } });
    });

    it('places a query-style continuation in the query string only', () => {
        const request = builder.build(
            {
                endpoint: 'browse',
                body: { browseId: 'FEmusic_home' },
                continuation: ContinuationCursor.from('NEXT_PAGE'),
                continuationStyle: { placement: 'query', type: 'next' },
            },
            session
        );

        expect(request.query).toEqual({
            prettyPrint: 'false',
            continuation: 'NEXT_PAGE',
            ctoken: 'NEXT_PAGE',
            type: 'next',
        });
        expect(Object.keys(request.body)).toEqual(['context']);
    });

    it('places a body-style continuation in the body', () => {
        const request = builder.build(
            {
                endpoint: 'next',
                body: { videoId: 'vid1' },
                continuation: ContinuationCursor.from('QUEUE_NEXT'),
                continuationStyle: { placement: 'body' },
            },
            session
        );

        expect(request.query).toEqual({ prettyPrint: 'false' });
        expect(request.body.continuation).toBe('QUEUE_NEXT');
        expect(request.body.videoId).toBeUndefined();
    });

    it('signs cookie sessions with SAPISIDHASH', () => {
        const headers = builder.buildHeaders({
            ...session,
            credentials: { cookie: 'SID=s1; SAPISID=test-sapisid' },
        });

        const digest = crypto.createHash('sha1')
            .update('1700000000 test-sapisid https://music.youtube.com')
            .digest('hex');
        expect(headers['Cookie']).toBe('SID=s1; SAPISID=test-sapisid');
        expect(headers['X-Goog-AuthUser']).toBe('0');
        expect(headers['Authorization']).toBe(`SAPISIDHASH 1700000000_${digest}`);
    });

    it('falls back to the secure SAPISID cookie', () => {
        const headers = builder.buildHeaders({
            ...session,
            credentials: { cookie: '__Secure-3PAPISID=secure-value' },
        });

        expect(headers['Authorization']).toBe(sapisidHash('secure-value', 'https://music.youtube.com', 1700000000));
    });

    it('sends a cookie without Authorization when no SAPISID is present', () => {
        const headers = builder.buildHeaders({ ...session, credentials: { cookie: 'PREF=x' } });

        expect(headers['Cookie']).toBe('PREF=x');
        expect(headers['Authorization']).toBeUndefined();
    });
});
