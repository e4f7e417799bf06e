export * from './git/index';
export * from './git/ignore-oracle';
export * from './scanner/index';
export * from './classify/classifier';
export * from './classify/extensions';
export * from './tree/renderer';
