/**
 * Textual dump of the backbone, wrinkle and tail layout
 */

import type { ListNode, NodeChain } from "./chain.js";

/**
 * Render the layout of a chain:
 * - the backbone is enclosed in `{}`, each untouched slot as `[item]`
 * - a slot whose run grew is `(inserted..., [base])`
 * - a slot whose run is empty is `X`
 * - tail nodes follow the backbone, each as `(item)`
 *
 * @example "{[B0], (I0, [B1]), X, [B3]}, (T0)"
 */
export function describeStructure<T>(chain: NodeChain<T>): string {
  const wrinkles = chain.wrinkles.entries();
  const slots: string[] = [];
  let node = chain.head;
  let w = 0;

  const take = (): string => {
    const label = node === undefined ? "?" : String(node.item);
    node = node?.next;
    return label;
  };

  for (let slot = 0; slot < chain.backbone.length; slot++) {
    const wrinkle = w < wrinkles.length && wrinkles[w].index === slot ? wrinkles[w++] : undefined;

    if (wrinkle === undefined) {
      slots.push(`[${take()}]`);
    } else if (wrinkle.offset < 0) {
      slots.push("X");
    } else {
      const run: string[] = [];
      for (let i = 0; i < wrinkle.offset; i++) {
        run.push(take());
      }
      run.push(`[${take()}]`);
      slots.push(`(${run.join(", ")})`);
    }
  }

  const parts = [`{${slots.join(", ")}}`];
  for (let tail: ListNode<T> | undefined = node; tail !== undefined; tail = tail.next) {
    parts.push(`(${String(tail.item)})`);
  }
  return parts.join(", ");
}
