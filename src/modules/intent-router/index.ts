/**
 * Intent Router Module - Public API
 */

export {
  ROUTES,
  CONFIDENCE_THRESHOLD,
  ClassificationOutputSchema,
  type Route,
  type Classification,
  type ClassificationOutput,
  type RoutingDecision,
} from './core/types.js';

export { classifyByKeywords, KEYWORD_CONFIDENCE } from './core/keywords.js';

export {
  routeQuestion,
  decideRoute,
  type RouteQuestionDeps,
  type RouteQuestionInput,
} from './core/usecases/route-question.js';
