import type { ClassRecord, FunctionRecord, GlobalVarRecord, MacroRecord } from '@finding-lookup/shared';

export const FUNCTION_KEYS = [
  'function_name',
  'file',
  'start_line',
  'function_id',
  'end_line',
  'caller_id',
] as const satisfies ReadonlyArray<keyof FunctionRecord>;

export const MACRO_KEYS = ['macro_name', 'body'] as const satisfies ReadonlyArray<keyof MacroRecord>;

export const GLOBAL_VAR_KEYS = [
  'global_var_name',
  'file',
  'start_line',
  'end_line',
] as const satisfies ReadonlyArray<keyof GlobalVarRecord>;

export const CLASS_KEYS = [
  'type',
  'class_name',
  'file',
  'start_line',
  'end_line',
  'simple_name',
] as const satisfies ReadonlyArray<keyof ClassRecord>;
