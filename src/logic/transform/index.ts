export { toNNF } from './nnf.js';
export {
    distribute,
    toCNF,
    toDNF,
    outerConnective,
    innerConnective,
    isJunction,
} from './distribute.js';
export { simplify, simplifyClauses, reduceClauses } from './simplify.js';
