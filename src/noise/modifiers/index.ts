export { Abs } from './abs';
export { Clamp } from './clamp';
export { Exponent } from './exponent';
export { Negate } from './negate';
export { ScaleBias } from './scaleBias';
