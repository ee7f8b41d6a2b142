export { TxContext, ContextKey } from './tx-context';
