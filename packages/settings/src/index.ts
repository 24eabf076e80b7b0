export { elementConverter, bool, float, int, str, url } from "./core/converters/scalars"
export { typedDict, typedOrderedDict } from "./core/converters/typed-dict"
export { boolList, floatList, intList, strList, typedList } from "./core/converters/typed-list"
export {
  ConversionError,
  type ConversionTarget,
  IncompleteValueError,
  type IncompleteOperation,
  InvalidKeyError,
  InvalidLanguageDataError,
  InvalidLanguageError,
  LineNumberUnavailableError,
  MissingOriginError,
  type SettingSubject,
  UnknownLanguageError,
} from "./core/errors/errors"
export {
  isSettingError,
  type SerializeOptions,
  SettingError,
  type SettingErrorOptions,
  serializeSettingError,
} from "./core/errors/setting-error"
export {
  defaultLanguageRegistry,
  type LanguageDefinition,
  languageDefinitionSchema,
  LanguageRegistry,
} from "./core/languages/language-registry"
export { language, languageConverter, toLanguage } from "./core/languages/to-language"
export { formatOrigin, originFile, toOrigin } from "./core/origin/origin"
export { globEscape } from "./core/paths/glob-escape"
export { type ResolvePathOptions, resolveGlobPath, resolvePath } from "./core/paths/resolve-path"
export { Setting, type SettingJSON, type SettingOptions } from "./core/setting/setting"
export { DEFAULT_LIST_DELIMITERS, TextValue, type TextValueOptions } from "./core/text/text-value"
export { unescape, unescapedSplit, unescapedStrip } from "./core/text/escaping"
export type {
  DictConverter,
  ElementConverter,
  ElementSource,
  ListConverter,
  MappingSource,
  MappingView,
} from "./ports/converter"
export type { ErrorContext, SerializedSettingError, SettingErrorCode } from "./ports/error"
export type { Language, LanguageLookup } from "./ports/language"
export type { Origin, OriginInput, SourcePosition } from "./ports/origin"
