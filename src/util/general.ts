import * as crypto from 'node:crypto';

// Latin accents fold to their base letter; letters and digits of any script are kept.
export const slugify = (value: string, fallback = 'untitled'): string => {
    const slug = value
        .normalize('NFKD')
        .replace(/[\u0300-\u036f]/g, '')
        .normalize('NFC')
        .trim()
        .toLowerCase()
        .replace(/[^\p{L}\p{N}]+/gu, '-')
        .replace(/^-+|-+$/g, '');
    return slug || fallback;
};

export const hashBytes = (data: Uint8Array, length = 12): string => {
    return crypto.createHash('sha256').update(data).digest('hex').slice(0, length);
};

export const truncate = (value: string, max: number, suffix = '...'): string => {
    return value.length > max ? value.slice(0, max) + suffix : value;
};
