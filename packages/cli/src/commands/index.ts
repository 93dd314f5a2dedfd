// @switchyard/cli - Command exports

export { createConfigCommand } from './config.js';
export { createPayCommand } from './pay.js';
export { createFeeCommand } from './fee.js';
export { createNotifyCommand } from './notify.js';
export { createCostCommand } from './cost.js';
export { createStatusCommand } from './status.js';
