export {
  SharedBrowser,
  type BrowserHandle,
  type BrowserLauncher,
  type SharedBrowserConfig,
} from './shared-browser.js';
export { BrowserUnavailableError } from './errors.js';
