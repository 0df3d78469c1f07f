export { extractCriterionSection } from './criteriaSection';
