/**
* Optional introspection capabilities of the theme subsystem.
*
* A registered theme manager may implement any subset of these; callers
* detect support with the guards below instead of assuming a fixed API.
*/

export interface ActiveThemeProvider {
  getActiveThemeId(): unknown;
}

export interface LayoutLister {
  listLayouts(): unknown;
}

export function isActiveThemeProvider(candidate: object): candidate is ActiveThemeProvider {
  return 'getActiveThemeId' in candidate && typeof candidate.getActiveThemeId === 'function';
}

export function isLayoutLister(candidate: object): candidate is LayoutLister {
  return 'listLayouts' in candidate && typeof candidate.listLayouts === 'function';
}
