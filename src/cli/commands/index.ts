// Licensed under the Hungry Ghost Hive License. See LICENSE.

export { configCommand } from './config.js';
export { hookCommand } from './hook.js';
export { initCommand } from './init.js';
export { prsCommand } from './prs.js';
export { ticketCommand } from './ticket.js';
export { ticketsCommand } from './tickets.js';
export { versionCommand } from './version.js';
