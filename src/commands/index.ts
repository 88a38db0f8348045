export { createGenerateCommand, runGenerate } from './generate.js';
export { createInstallCommand, runInstall, performInstall } from './install.js';
export { createValidateCommand, runValidate } from './validate.js';
