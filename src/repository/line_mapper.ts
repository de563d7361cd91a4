import { Identifier, ProductionLine } from '../domain/types';
import { parseAllowedProducts, parseChangeoverMatrix } from '../scheduler/changeover';
import { LineRecord } from './schedule_repository';

export function toProductionLine(id: Identifier, record: LineRecord): ProductionLine {
  return {
    id,
    name: record.name,
    status: record.status,
    allowedProducts: parseAllowedProducts(record.allowedProducts),
    changeoverMatrix: parseChangeoverMatrix(record.changeoverMatrix),
  };
}
