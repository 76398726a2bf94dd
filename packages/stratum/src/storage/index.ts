export { Storage } from "./storage"
