export { createQueryFacade, type QueryFacade } from "./facade.js";
