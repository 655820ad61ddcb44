import { randomBytes } from 'node:crypto';

export const GATEWAY_SECRET_PATTERN = /^[0-9a-f]{64}$/;

/**
 * 32 random bytes as 64 lowercase hex characters
 */
export function generateGatewaySecret(): string {
    return randomBytes(32).toString('hex');
}

export function isGatewaySecret(value: string): boolean {
    return GATEWAY_SECRET_PATTERN.test(value);
}
