import type { BoneData, SkeletonNode } from "./types.js";

export interface SkeletonReconstruction {
  root: SkeletonNode | null;
  bonesAttached: number;
  complete: boolean;
  warnings: string[];
}

function createNode(index: number, matrix: Uint8Array): SkeletonNode {
  return { index, matrix, children: [] };
}

/**
 * Attach a bone under an already-inserted parent. `nodes` is indexed by bone
 * index and grows as bones are inserted.
 */
export function insertBone(nodes: SkeletonNode[], matrix: Uint8Array, parent: number): SkeletonNode | null {
  const parentNode = nodes[parent];
  if (!Number.isInteger(parent) || parent < 0 || !parentNode) {
    return null;
  }
  const node = createNode(nodes.length, matrix);
  parentNode.children.push(node);
  nodes.push(node);
  return node;
}

export function reconstructSkeleton(
  boneMatrices: readonly Uint8Array[],
  boneData: readonly BoneData[],
  boneCount: number,
): SkeletonReconstruction {
  const rootMatrix = boneMatrices[0];
  if (!rootMatrix || boneData.length === 0) {
    return { root: null, bonesAttached: 0, complete: boneCount === 0, warnings: [] };
  }

  const warnings: string[] = [];
  const root = createNode(0, rootMatrix);
  const nodes: SkeletonNode[] = [root];
  const available = Math.min(boneMatrices.length, boneData.length);
  if (available < boneCount) {
    warnings.push(
      `Skeleton declares ${boneCount} bones but only ${boneMatrices.length} matrices and ${boneData.length} data records exist; stopping at ${available}.`,
    );
  }
  const limit = Math.min(boneCount, available);

  for (let i = 1; i < limit; i += 1) {
    const matrix = boneMatrices[i];
    const data = boneData[i];
    if (!matrix || !data) break;
    if (data.parent >= i || insertBone(nodes, matrix, data.parent) === null) {
      warnings.push(`Bone ${i} has parent ${data.parent}, which is not an earlier bone; skeleton truncated at ${i} bones.`);
      return { root, bonesAttached: nodes.length, complete: false, warnings };
    }
  }

  return { root, bonesAttached: nodes.length, complete: nodes.length >= boneCount, warnings };
}

/** Depth-first `[index, parentIndex]` pairs; the root reports parent -1. */
export function flattenSkeleton(root: SkeletonNode | null): Array<[number, number]> {
  const out: Array<[number, number]> = [];
  const visit = (node: SkeletonNode, parent: number) => {
    out.push([node.index, parent]);
    for (const child of node.children) visit(child, node.index);
  };
  if (root) visit(root, -1);
  return out;
}
