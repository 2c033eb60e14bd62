/**
 * Entity model exports
 */

export {
  Contact,
  CONTACT_TYPES,
  contactKey,
  contactTypeLabel,
  isContactTypeName,
  isCreatableType,
  type ContactInit,
  type ContactTypeName,
} from './contact.js';

export {
  Monitor,
  compareMonitors,
  renderContactRefs,
  DEFAULT_INTERVAL_MINUTES,
  MIN_INTERVAL_MINUTES,
  MAX_INTERVAL_MINUTES,
  type AlertSettings,
  type ContactAssignment,
  type ContactRef,
  type DeclareMonitorOptions,
  type FieldChange,
  type MonitorInit,
} from './monitor.js';

export {
  SENSITIVE_FIELDS,
  settingsFields,
  settingsTarget,
  validateSettings,
  type DeclarableSettings,
  type FieldValue,
  type HttpSettings,
  type KeywordSettings,
  type MonitorKind,
  type MonitorSettings,
  type OtherSettings,
  type PortSettings,
} from './settings.js';
