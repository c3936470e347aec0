/**
* Export component registry
*
* Theme and plugin subsystems running in this process register the objects
* the export probes for capabilities (`getActiveThemeId`, `listLayouts`,
* `listEnabledPluginIds`). Registration must happen before the server builds
* the export service. With no theme component registered, theme.json carries
* the "Theme manager not available." placeholder.
*/

const themeComponents: Set<object> = new Set();
const pluginComponents: Set<object> = new Set();

/**
* Register a theme subsystem component
* @returns Function to unregister the component
*/
export function registerThemeComponent(component: object): () => void {
  themeComponents.add(component);
  return () => themeComponents.delete(component);
}

/**
* Register a plugin subsystem component
* @returns Function to unregister the component
*/
export function registerPluginComponent(component: object): () => void {
  pluginComponents.add(component);
  return () => pluginComponents.delete(component);
}

/** Registered theme components, or null when no theme subsystem registered any */
export function getThemeComponents(): readonly object[] | null {
  return themeComponents.size > 0 ? Array.from(themeComponents) : null;
}

export function getPluginComponents(): readonly object[] {
  return Array.from(pluginComponents);
}

export function clearExportComponents(): void {
  themeComponents.clear();
  pluginComponents.clear();
}
