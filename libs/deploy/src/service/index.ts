export { ServiceTemplate, SERVICE_DIRECTIVES, type ServiceDirective } from './template.js';
export {
  ServiceRegistrar,
  buildServiceDescriptor,
  type ServiceRegistrarOptions,
  type ServiceRegistrarDeps,
  type RegistrationStep,
} from './registrar.js';
export { renderAutostartEntry, writeAutostartEntry, type AutostartOptions } from './autostart.js';
