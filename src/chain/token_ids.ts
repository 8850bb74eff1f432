import { ethers } from 'ethers';

export const PARENT_COLLECTION_ID = ethers.constants.HashZero;

export function indexSetFor(outcomeIndex: number): bigint {
  return 1n << BigInt(outcomeIndex);
}

/**
 * Collection id for one outcome slot of a condition, rooted at the empty
 * parent collection.
 */
export function collectionIdFor(conditionId: string, outcomeIndex: number): string {
  return ethers.utils.solidityKeccak256(
    ['bytes32', 'bytes32', 'uint256'],
    [PARENT_COLLECTION_ID, conditionId, indexSetFor(outcomeIndex).toString()]
  );
}

export function positionIdFor(collateralToken: string, collectionId: string): string {
  const hash = ethers.utils.solidityKeccak256(['address', 'bytes32'], [collateralToken, collectionId]);
  return ethers.BigNumber.from(hash).toString();
}

/**
 * Outcome token ids (ERC-1155 position ids, as decimal strings) in outcome
 * order.
 */
export function deriveOutcomeTokenIds(
  conditionId: string,
  outcomeCount: number,
  collateralToken: string
): string[] {
  if (!Number.isInteger(outcomeCount) || outcomeCount < 2) {
    throw new Error(`outcome count must be an integer >= 2, got ${outcomeCount}`);
  }
  const ids: string[] = [];
  for (let i = 0; i < outcomeCount; i += 1) {
    ids.push(positionIdFor(collateralToken, collectionIdFor(conditionId, i)));
  }
  return ids;
}

export function normalizeTokenId(value: ethers.BigNumberish): string {
  return ethers.BigNumber.from(value).toString();
}

export function normalizeBytes32(value: string): string {
  return ethers.utils.hexZeroPad(value, 32).toLowerCase();
}
