/**
 * Allow-List Commitment
 *
 * Sorted-pair SHA-256 Merkle tree over item ids.
 * - leaf  = sha256(id as 32-byte big-endian word)
 * - node  = sha256(min(a, b) || max(a, b))
 * - an unpaired node at the end of a layer is promoted unchanged
 *
 * Because pairs are sorted, a proof is just the list of sibling digests,
 * no left/right flags.
 */

import { bufferToDigest, digestToBuffer, sha256Bytes, uint256Word } from '../../protocol/utils/crypto.js';
import { isZeroRoot } from '../../protocol/params/pool.js';
import { InvalidInputError, NotFoundError } from '../../protocol/errors.js';

export type Proof = string[];

export function leafHash(itemId: bigint): string {
    return bufferToDigest(sha256Bytes(uint256Word(itemId)));
}

export function hashPair(a: string, b: string): string {
    const [lo, hi] = a.toLowerCase() <= b.toLowerCase() ? [a, b] : [b, a];
    return bufferToDigest(sha256Bytes(Buffer.concat([digestToBuffer(lo), digestToBuffer(hi)])));
}

export function verifyProof(proof: Proof, root: string, itemId: bigint): boolean {
    let computed = leafHash(itemId);
    for (const sibling of proof) {
        computed = hashPair(computed, sibling);
    }
    return computed === root.toLowerCase();
}

/**
 * True if the item may enter a pair committed to `root`.
 * The zero root admits every id.
 */
export function isEligible(root: string, itemId: bigint, proof: Proof): boolean {
    if (isZeroRoot(root)) return true;
    return verifyProof(proof, root, itemId);
}

export class AllowListTree {
    private readonly layers: string[][];
    private readonly leafIndex: Map<string, number>;

    constructor(itemIds: bigint[]) {
        if (itemIds.length === 0) {
            throw new InvalidInputError('Allow-list needs at least one item id');
        }

        const leaves = Array.from(new Set(itemIds.map(leafHash))).sort();
        this.leafIndex = new Map(leaves.map((leaf, i) => [leaf, i]));
        this.layers = [leaves];

        let layer = leaves;
        while (layer.length > 1) {
            const next: string[] = [];
            for (let i = 0; i < layer.length; i += 2) {
                const left = layer[i];
                const right = layer[i + 1];
                next.push(right === undefined ? left : hashPair(left, right));
            }
            this.layers.push(next);
            layer = next;
        }
    }

    get root(): string {
        return this.layers[this.layers.length - 1][0];
    }

    get size(): number {
        return this.layers[0].length;
    }

    has(itemId: bigint): boolean {
        return this.leafIndex.has(leafHash(itemId));
    }

    proof(itemId: bigint): Proof {
        let index = this.leafIndex.get(leafHash(itemId));
        if (index === undefined) {
            throw new NotFoundError(`Item #${itemId} is not in the allow-list`);
        }

        const proof: Proof = [];
        for (const layer of this.layers.slice(0, -1)) {
            const siblingIndex = index % 2 === 0 ? index + 1 : index - 1;
            const sibling = layer[siblingIndex];
            if (sibling !== undefined) proof.push(sibling);
            index = Math.floor(index / 2);
        }
        return proof;
    }

    static verify(proof: Proof, root: string, itemId: bigint): boolean {
        return verifyProof(proof, root, itemId);
    }
}
