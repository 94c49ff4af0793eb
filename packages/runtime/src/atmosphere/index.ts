export {
  vaporPressureAir,
  meanVaporPressureDeficit,
  maxVaporPressureDeficit,
} from './vapor.js';
