export {
  DivisionTableSchema,
  InputContractValidator,
  LineSchema,
  LinesSchema,
  PageNumberSchema,
} from './input-contract-validator';
