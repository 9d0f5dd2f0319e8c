/**
 * Request handling module.
 *
 * This module contains the request descriptor and the utilities it uses to
 * resolve URI templates and assemble requests for the transport.
 */

export { RequestDescriptor, type RequestBody, type RequestDescriptorOptions } from './request-descriptor.ts';
export { buildRequest, buildRequestInit, type BuiltRequest } from './request-builder.ts';
export {
  BASE_URL_KEY,
  BASE_URL_TOKEN,
  BINARY_CONTENT_TYPE,
  CONTENT_TYPE_HEADER,
  RAW_URL_KEY,
} from './constants.ts';
export {
  DateOnly,
  formatAtom,
  isEmptyQueryValue,
  sanitizeParameters,
  sanitizeValue,
  type ParameterMap,
  type ParameterValue,
  type PrimitiveParameter,
  type SanitizedValue,
} from './parameter-values.ts';
export {
  defineQueryParameters,
  type QueryParameterAliases,
  type QueryParameterShape,
  type QueryParameterSource,
} from './query-parameters.ts';
export type { RequestOption } from './request-options.ts';
export {
  expandTemplate,
  hasBaseUrlToken,
  mergeParameters,
  parseTemplate,
  type TemplateInterface,
} from './template-utils.ts';
