export { Blend } from './blend';
export { Select } from './select';
