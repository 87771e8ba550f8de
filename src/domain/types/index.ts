export type {
  MetricType,
  TestType,
  MdeType,
  CorrectionMethod,
  Sides,
  NullVariance,
  EffectDirection,
  DesignSpecification,
  MdeSpecification,
  ResolvedDesign,
  ResolvedMdeDesign,
} from './design';
