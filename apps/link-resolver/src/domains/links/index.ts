export { createLinksModule, registerRootLinkRoute } from "./api"
export { createLinkServices, type LinkServices } from "./composition"
