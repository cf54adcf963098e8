export type {
  BrowserSessionOptions,
  IBrowserSession,
  IBrowserSessionFactory,
  NavigateOptions,
  PageSnapshot,
} from "./IBrowserSession";
export {
  PlaywrightBrowserSession,
  PlaywrightBrowserSessionFactory,
  toPlaywrightCookies,
} from "./PlaywrightBrowserSession";
export { withBrowserSession } from "./BrowserSessionScope";
