export { OrthographyStandardizer, kORTHOGRAPHY_PASSES } from "./OrthographyStandardizer.js";
