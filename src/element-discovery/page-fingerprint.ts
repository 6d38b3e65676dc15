import { createHash } from 'crypto';
import type { IAccessibilityNode, IPageFingerprint } from '../types/index.js';

/**
 * Serialize the parts of the tree that identify page content.
 * Bounding boxes are left out so scrolling and reflow keep the fingerprint stable.
 */
export function serializeAccessibilityTree(tree: IAccessibilityNode[]): string {
  return JSON.stringify(
    tree.map(node => [
      node.selector,
      node.role,
      node.name ?? '',
      node.text ?? '',
      node.label ?? '',
      node.placeholder ?? '',
      node.visible === false ? 0 : 1
    ])
  );
}

export function computePageFingerprint(url: string, tree: IAccessibilityNode[]): IPageFingerprint {
  const contentHash = createHash('sha256').update(serializeAccessibilityTree(tree)).digest('hex');
  return {
    url,
    contentHash,
    id: `${url}#${contentHash.substring(0, 16)}`
  };
}
