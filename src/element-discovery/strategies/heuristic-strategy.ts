import { IDiscoveryRequest, IElementDiscoveryStrategy } from '../index.js';
import { parseDescriptor, IDescriptorQuery } from '../descriptor.js';
import type { IAccessibilityNode, IElementLocator } from '../../types/index.js';
import type { HeuristicRank } from '../../types/config.js';
import { HEURISTIC_SCORES, ROLE_HINTS } from '../../constants/index.js';
import { normalizeDescriptor } from '../../cache/locator-cache.js';
import { ILogger } from '../../infra/logger.js';

interface IScoredNode {
  node: IAccessibilityNode;
  match: HeuristicRank;
}

function norm(value: string | undefined): string {
  return value ? normalizeDescriptor(value) : '';
}

/**
 * Deterministic matching against the accessibility tree.
 * Ranks: exact text > aria-label/label > placeholder > role > substring.
 * Equal ranks resolve to the first node in document order.
 */
export class HeuristicStrategy implements IElementDiscoveryStrategy {
  public readonly name = 'heuristic';

  constructor(
    private minSpecificity: HeuristicRank,
    private logger: ILogger
  ) {}

  async discover(request: IDiscoveryRequest): Promise<IElementLocator | null> {
    const query = parseDescriptor(request.descriptor);
    const scored = this.scoreNodes(request.snapshot.accessibilityTree, query);

    if (scored.length === 0) {
      this.logger.debug(`HEURISTIC: No candidates for "${request.descriptor}"`, { roleHint: query.roleHint });
      return null;
    }

    const best = scored.reduce((top, candidate) =>
      HEURISTIC_SCORES[candidate.match].rank > HEURISTIC_SCORES[top.match].rank ? candidate : top
    );

    const bar = HEURISTIC_SCORES[this.minSpecificity].rank;
    if (HEURISTIC_SCORES[best.match].rank < bar) {
      this.logger.debug(`HEURISTIC: Best candidate for "${request.descriptor}" below minimum specificity`, {
        match: best.match,
        minSpecificity: this.minSpecificity
      });
      return null;
    }

    const tied = scored.filter(s => s.match === best.match).length;
    this.logger.debug(`HEURISTIC: Resolved "${request.descriptor}"`, {
      selector: best.node.selector,
      match: best.match,
      tiedCandidates: tied
    });

    return {
      target: { kind: 'selector', selector: best.node.selector },
      confidence: HEURISTIC_SCORES[best.match].confidence,
      resolvedBy: 'heuristic',
      boundingBox: best.node.boundingBox,
      timestamp: Date.now()
    };
  }

  private scoreNodes(tree: IAccessibilityNode[], query: IDescriptorQuery): IScoredNode[] {
    const scored: IScoredNode[] = [];

    for (const node of tree) {
      if (node.visible === false) {
        continue;
      }
      if (query.roles && !query.roles.includes(node.role)) {
        continue;
      }
      const match = this.matchNode(node, query.text);
      if (match) {
        scored.push({ node, match });
      }
    }

    return scored;
  }

  private matchNode(node: IAccessibilityNode, text: string): HeuristicRank | null {
    if (!text) {
      return null;
    }

    const name = norm(node.name);
    const content = norm(node.text);
    const label = norm(node.label);
    const placeholder = norm(node.placeholder);

    if (name === text || content === text) return 'exact';
    if (label === text) return 'label';
    if (placeholder === text) return 'placeholder';
    if (node.role === text || this.roleWordMatches(text, node.role)) return 'role';
    if ([name, content, label, placeholder].some(value => value.length > 0 && value.includes(text))) {
      return 'substring';
    }
    return null;
  }

  private roleWordMatches(text: string, role: string): boolean {
    for (const [word, roles] of Object.entries(ROLE_HINTS)) {
      if (word === text) {
        const compatible: readonly string[] = roles;
        return compatible.includes(role);
      }
    }
    return false;
  }
}
