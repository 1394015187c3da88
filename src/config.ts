// Identity stamped into every document this tool writes
export const TOOL_NAME = 'bomwright';
export const TOOL_VERSION = '1.0.0';

// Fixed header values for merged documents
export const OUTPUT_SPDX_VERSION = 'SPDX-2.3';
export const OUTPUT_DATA_LICENSE = 'CC0-1.0';
export const DOCUMENT_ID = 'SPDXRef-DOCUMENT';
export const DEFAULT_NAMESPACE_BASE = 'https://spdx.org/spdxdocs';

// License list version used when no input declares one
export const DEFAULT_LICENSE_LIST_VERSION = '3.19';

// Environment variable that turns on debug output
export const DEBUG_ENV_VAR = 'BOMWRIGHT_DEBUG';
