export { toHandler, makeHandler, type WebHandler } from "./handler"
