export { ParamNumber } from './ParamNumber';
export type { ParamNumberProps } from './ParamNumber';

export { ParamSelect } from './ParamSelect';
export type { ParamSelectProps } from './ParamSelect';

export { DerivedField } from './DerivedField';
export type { DerivedFieldProps } from './DerivedField';
