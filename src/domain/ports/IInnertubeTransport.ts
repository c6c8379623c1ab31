/**
 * Fully-formed outbound request, as produced by the request builder.
 * The transport knows nothing about what the body means.
 */
export interface OutboundRequest {
    /** Upstream endpoint path relative to the API base, e.g. "search" */
    endpoint: string;
    url: string;
    query: Record<string, string>;
    headers: Record<string, string>;
    body: Record<string, unknown>;
}

export interface RawResponse {
    status: number;
    /** Parsed JSON body; shape is unchecked */
    data: unknown;
    headers: Record<string, string | string[] | undefined>;
}

export interface TransportCallOptions {
    /** Aborting never leaves a partial session update behind */
    signal?: AbortSignal;
}

/**
 * IInnertubeTransport - Port for executing upstream requests.
 * Implementations: InnertubeTransport (HTTP), FixtureTransport (TEST_MODE)
 */
export interface IInnertubeTransport {
    /**
     * Executes the request with the transport's timeout and retry policy.
     * @throws TransportFailure once retries are exhausted
     * @throws AuthRequired when the upstream rejects the credentials
     */
    execute(request: OutboundRequest, options?: TransportCallOptions): Promise<RawResponse>;
}
