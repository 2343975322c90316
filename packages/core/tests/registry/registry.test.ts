import { describe, it, expect } from 'vitest';
import { IdentifierRegistry } from '../../src/registry/registry.js';

describe('IdentifierRegistry', () => {
    it('reports an identifier as seen only after it is marked', () => {
        const registry = new IdentifierRegistry();
        expect(registry.seen('first', 'A')).toBe(false);

        registry.mark('first', 'A');
        expect(registry.seen('first', 'A')).toBe(true);
    });

    it('keeps stages independent', () => {
        const registry = new IdentifierRegistry();
        registry.mark('first', 'A');

        expect(registry.seen('second', 'A')).toBe(false);
        expect(registry.count('first')).toBe(1);
        expect(registry.count('second')).toBe(0);
    });

    it('counts each identifier once', () => {
        const registry = new IdentifierRegistry();
        registry.mark('first', 'A');
        registry.mark('first', 'A');
        registry.mark('first', 'B');

        expect(registry.count('first')).toBe(2);
    });

    it('tracks sub-identifiers globally, independent of any stage', () => {
        const registry = new IdentifierRegistry();
        registry.markSub('s1');

        expect(registry.seenSub('s1')).toBe(true);
        expect(registry.seenSub('s2')).toBe(false);
        expect(registry.seen('second', 's1')).toBe(false);
        expect(registry.subCount()).toBe(1);
    });
});
