export {
  OutlineContractError,
  UnorderedLinesError,
} from './outline-contract-error';
export type { ContractIssue } from './outline-contract-error';
