/**
 * Hook chaining across a commander command tree.
 *
 * Each bound command owns a list of resolve operations. When a command is
 * dispatched (or its help is shown), the operations of every bound command on
 * the path from the root down to it run once each, root first.
 *
 * commander invokes the preAction hook of every ancestor of the dispatched
 * command. The chain does not rely on that ordering: only the deepest bound
 * command on the path reacts, and it walks the path itself.
 */

import { Command } from 'commander';
import { getLogger } from './logger.js';

/** A resolve step bound to one command; receives the command being dispatched. */
export type ResolveOperation = (dispatched: Command) => void;

export class HookChain {
  private readonly bound = new Map<Command, ResolveOperation[]>();

  /**
   * Attach an operation to a command. The first bind on a command installs
   * its preAction hook and its help hook; later binds append operations,
   * which run in bind order.
   */
  bind(node: Command, operation: ResolveOperation): void {
    const existing = this.bound.get(node);
    if (existing) {
      existing.push(operation);
      return;
    }
    this.bound.set(node, [operation]);

    node.hook('preAction', (_hooked, actionCommand) => {
      if (this.deepestBound(actionCommand) === node) {
        this.run(actionCommand);
      }
    });
    node.addHelpText('beforeAll', ({ command }) => {
      if (this.deepestBound(command) === node) {
        this.run(command);
      }
      return '';
    });
  }

  isBound(node: Command): boolean {
    return this.bound.has(node);
  }

  /** Commands from the tree root down to `node`, inclusive. */
  pathTo(node: Command): Command[] {
    const path: Command[] = [];
    for (let current: Command | null = node; current; current = current.parent) {
      path.unshift(current);
    }
    return path;
  }

  /** Nearest bound command at or above `node`. */
  deepestBound(node: Command): Command | undefined {
    for (let current: Command | null = node; current; current = current.parent) {
      if (this.bound.has(current)) return current;
    }
    return undefined;
  }

  /**
   * Run every bound operation on the path to `target`, root first, each once.
   * A failing operation stops the chain and the error propagates; operations
   * that already ran keep their effects.
   *
   * @returns The bound commands whose operations ran, in order
   */
  run(target: Command): Command[] {
    const visited = new Set<Command>();
    const ran: Command[] = [];
    for (const node of this.pathTo(target)) {
      const operations = this.bound.get(node);
      if (!operations || visited.has(node)) continue;
      visited.add(node);
      getLogger('hooks').debug({ command: node.name(), target: target.name() }, 'Running resolve hooks');
      for (const operation of operations) {
        operation(target);
      }
      ran.push(node);
    }
    return ran;
  }
}
