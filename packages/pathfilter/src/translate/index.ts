export {
  type PredicateTranslationContext,
  type TranslatedFilter,
  translateFilter,
  type TranslateFilterOptions,
  type TranslationErrorContext,
  type TranslatorHooks,
} from "./sql-translator";
