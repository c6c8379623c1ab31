import { TransportFailure } from '../../domain/errors/InnertubeErrors';
import {
    IInnertubeTransport,
    OutboundRequest,
    RawResponse,
} from '../../domain/ports/IInnertubeTransport';
import { FixtureLoader } from '../fixtures/FixtureLoader';

/**
 * Serves recorded responses instead of calling the upstream.
 * `<endpoint>.json` answers first pages, `<endpoint>.continuation.json`
 * answers continuation requests.
 */
export class FixtureTransport implements IInnertubeTransport {
    constructor(private readonly loader: FixtureLoader) { }

    static fixtureName(request: OutboundRequest): string {
        const isContinuation = request.query.ctoken !== undefined || typeof request.body.continuation === 'string';
        const base = request.endpoint.replace(/\//g, '_');
        return isContinuation ? `${base}.continuation.json` : `${base}.json`;
    }

    async execute(request: OutboundRequest): Promise<RawResponse> {
        const name = FixtureTransport.fixtureName(request);
        console.log(`[Transport] TEST_MODE: serving ${request.endpoint} from ${name}`);

        try {
            const data = await this.loader.load(name);
            return { status: 200, data, headers: {} };
        } catch (error: unknown) {
            const message = error instanceof Error ? error.message : String(error);
            throw new TransportFailure('network', request.endpoint, `No fixture for ${request.endpoint}: ${message}`);
        }
    }
}
