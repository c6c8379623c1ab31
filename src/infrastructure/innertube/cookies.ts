/**
 * Cookie header helpers for the signed-in session's cookie bundle.
 */

export function parseCookieHeader(cookie: string): Map<string, string> {
    const jar = new Map<string, string>();
    for (const part of cookie.split(';')) {
        const index = part.indexOf('=');
        if (index <= 0) continue;
        const name = part.substring(0, index).trim();
        if (name) jar.set(name, part.substring(index + 1).trim());
    }
    return jar;
}

export function serializeCookies(jar: Map<string, string>): string {
    return Array.from(jar.entries())
        .map(([name, value]) => `${name}=${value}`)
        .join('; ');
}

interface SetCookie {
    name: string;
    value: string;
    expired: boolean;
}

function parseSetCookie(header: string, now: number): SetCookie | null {
    const [pair, ...attributes] = header.split(';');
    const index = pair.indexOf('=');
    if (index <= 0) return null;

    let expired = false;
    for (const attribute of attributes) {
        const [rawKey, ...rest] = attribute.split('=');
        const key = rawKey.trim().toLowerCase();
        const value = rest.join('=').trim();
        if (key === 'max-age' && Number(value) <= 0) {
            expired = true;
        } else if (key === 'expires') {
            const expires = Date.parse(value);
            if (!isNaN(expires) && expires <= now) expired = true;
        }
    }

    return {
        name: pair.substring(0, index).trim(),
        value: pair.substring(index + 1).trim(),
        expired,
    };
}

/**
 * Applies rotated cookies from Set-Cookie headers to a cookie header.
 * Expired cookies are removed, unknown cookies are added.
 */
export function mergeSetCookies(cookie: string, setCookies: string[], now: number = Date.now()): string {
    const jar = parseCookieHeader(cookie);
    for (const header of setCookies) {
        const parsed = parseSetCookie(header, now);
        if (!parsed) continue;
        if (parsed.expired) {
            jar.delete(parsed.name);
        } else {
            jar.set(parsed.name, parsed.value);
        }
    }
    return serializeCookies(jar);
}
