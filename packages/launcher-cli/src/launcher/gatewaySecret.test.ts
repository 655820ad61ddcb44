import { describe, expect, it } from 'vitest';

import { generateGatewaySecret, isGatewaySecret } from './gatewaySecret';

describe('generateGatewaySecret', () => {
    it('produces distinct 64-character lowercase hex secrets', () => {
        const secrets = new Set(Array.from({ length: 50 }, () => generateGatewaySecret()));

        expect(secrets.size).toBe(50);
        for (const secret of secrets) {
            expect(secret).toMatch(/^[0-9a-f]{64}$/);
        }
    });

    it('rejects anything but 64 lowercase hex characters', () => {
        expect(isGatewaySecret('A'.repeat(64))).toBe(false);
        expect(isGatewaySecret('a'.repeat(63))).toBe(false);
        expect(isGatewaySecret('0f'.repeat(32))).toBe(true);
    });
});
