export { AggressivePolicy } from "./aggressive";
