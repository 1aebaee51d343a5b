export * from './notification-setting.dto';
