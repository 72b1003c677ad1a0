export { parseInitOptions, parseResolveOptions, parseValidateOptions } from './cli-parser';
export { loadConfig, loadConfigDocument, resolveConfigPath, type LoadedDocument } from './config-loader';
export { readIniDocument } from './ini-reader';
export { validateVardir } from './vardir';
