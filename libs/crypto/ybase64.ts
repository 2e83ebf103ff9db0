/**
 * Y64: base64 with the URL-hostile characters swapped.
 *   '+' -> '.'   '/' -> '_'   '=' -> '-'
 * Signatures and public keys in signed policy documents use this encoding.
 */

export function encode(data: Buffer | string): string {
    const buf = typeof data === 'string' ? Buffer.from(data, 'utf-8') : data;
    return buf.toString('base64')
        .replace(/\+/g, '.')
        .replace(/\//g, '_')
        .replace(/=/g, '-');
}

export function decode(text: string): Buffer {
    const b64 = text
        .replace(/\./g, '+')
        .replace(/_/g, '/')
        .replace(/-/g, '=');
    if (!/^[A-Za-z0-9+/]*={0,2}$/.test(b64)) {
        throw new Error('illegal ybase64 data');
    }
    return Buffer.from(b64, 'base64');
}
