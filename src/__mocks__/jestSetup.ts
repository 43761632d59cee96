/**
 * Runs before every test file: keep tests away from the real ~/.ssh/config,
 * poll without sleeping, and keep the console quiet.
 */
import { updateSettings } from '../utils/settings';

updateSettings({
  loadSshConfig: false,
  pollInterval: 0,
  logLevel: 'silent',
});
