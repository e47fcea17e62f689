export { BaseController } from './BaseController';
export { ContactController } from './ContactController';
export { HealthController } from './HealthController';
