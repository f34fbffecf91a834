import type { Node } from './types.js';

/**
 * S-expression rendering, e.g. `(func (proto add a b) (+ a b))`
 */
export function show(n: Node): string {
  switch (n.t) {
    case 'num':
      return String(n.v);
    case 'var':
      return n.name;
    case 'binary':
      return `(${n.op} ${show(n.left)} ${show(n.right)})`;
    case 'call':
      return n.args.length === 0 ? `(call ${n.callee})` : `(call ${n.callee} ${n.args.map(show).join(' ')})`;
    case 'proto':
      return n.params.length === 0 ? `(proto ${n.name})` : `(proto ${n.name} ${n.params.join(' ')})`;
    case 'func':
      return `(func ${show(n.proto)} ${show(n.body)})`;
  }
}
