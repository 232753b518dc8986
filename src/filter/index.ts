/**
 * Filter Module
 * @module filter
 */

export { Filter, IGNORE_TAG, defaultFilter, type FilterOptions, type FilterResult, type FilteredTest } from './filter.js';
