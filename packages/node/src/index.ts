export { serve, makeServerLayer, serverUrl, type ServeOptions } from "./serve"
