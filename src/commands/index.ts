export { encryptCommand } from './encrypt.js';
export { decryptCommand } from './decrypt.js';
export { passphraseCommand } from './passphrase.js';
export { strengthCommand } from './strength.js';
export { menuCommand, runMenu } from './menu.js';
