import { describe, it, expect } from 'vitest';
import { AllowListTree, hashPair, isEligible, leafHash, verifyProof } from '../../src/runtime/pool/AllowList.js';
import { InvalidInputError, NotFoundError } from '../../src/protocol/errors.js';
import { ZERO_ROOT } from '../../src/protocol/params/pool.js';

const LEAF_1 = '0xec4916dd28fc4c10d78e287ca5d9cc51ee1ae73cbfde08c6b37324cbfaac8bc5';
const LEAF_2 = '0x9267d3dbed802941483f1afa2a6bc68de5f653128aca9bf1461c5d0a3ad36ed2';
const LEAF_3 = '0xd9147961436944f43cd99d28b2bbddbf452ef872b30c8279e255e7daafc7f946';
const ROOT_123 = '0x8ab04ed91d7c06626ea914e0ae54cd98623143d1b25ef83e8818308c0d4c479b';

describe('Allow-list hashing', () => {
    it('hashes an id as a 32-byte big-endian word', () => {
        expect(leafHash(1n)).toBe(LEAF_1);
        expect(leafHash(2n)).toBe(LEAF_2);
    });
    it('hashes pairs in sorted order', () => {
        expect(hashPair(LEAF_1, LEAF_2)).toBe(hashPair(LEAF_2, LEAF_1));
    });
});

describe('AllowListTree', () => {
    const tree = new AllowListTree([3n, 1n, 2n]);

    it('commits to the sorted leaves and promotes the unpaired one', () => {
        expect(tree.root).toBe(ROOT_123);
        expect(tree.root).toBe(hashPair(hashPair(LEAF_2, LEAF_3), LEAF_1));
        expect(tree.size).toBe(3);
    });

    it('builds proofs of sibling digests only', () => {
        expect(tree.proof(2n)).toEqual([LEAF_3, LEAF_1]);
        expect(tree.proof(1n)).toEqual([hashPair(LEAF_2, LEAF_3)]);
    });

    it('verifies every member and rejects outsiders', () => {
        for (const id of [1n, 2n, 3n]) {
            expect(AllowListTree.verify(tree.proof(id), tree.root, id)).toBe(true);
        }
        expect(verifyProof(tree.proof(2n), tree.root, 4n)).toBe(false);
        expect(verifyProof(tree.proof(2n), tree.root, 3n)).toBe(false);
    });

    it('accepts an upper-case root', () => {
        expect(verifyProof(tree.proof(3n), tree.root.toUpperCase().replace('0X', '0x'), 3n)).toBe(true);
    });

    it('uses the leaf itself as the root of a single-item tree', () => {
        const single = new AllowListTree([1n]);
        expect(single.root).toBe(LEAF_1);
        expect(single.proof(1n)).toEqual([]);
    });

    it('ignores duplicate ids', () => {
        expect(new AllowListTree([1n, 2n, 3n, 2n]).root).toBe(ROOT_123);
    });

    it('rejects an empty set', () => {
        expect(() => new AllowListTree([])).toThrow(InvalidInputError);
    });

    it('has no proof for an absent id', () => {
        expect(tree.has(4n)).toBe(false);
        expect(() => tree.proof(4n)).toThrow(NotFoundError);
    });
});

describe('isEligible', () => {
    it('admits every id under the zero root', () => {
        expect(isEligible(ZERO_ROOT, 123456789n, [])).toBe(true);
    });
    it('requires a proof under any other root', () => {
        expect(isEligible(ROOT_123, 2n, [])).toBe(false);
        expect(isEligible(ROOT_123, 2n, [LEAF_3, LEAF_1])).toBe(true);
    });
});
