/**
 * Well-known attribute names
 *
 * Backends accept any printable name; these are the ones the sound
 * services understand.
 */

export const SoundAttr = {
  // Media
  MEDIA_NAME: 'media.name',
  MEDIA_TITLE: 'media.title',
  MEDIA_ARTIST: 'media.artist',
  MEDIA_LANGUAGE: 'media.language',
  MEDIA_FILENAME: 'media.filename',
  MEDIA_ICON_NAME: 'media.icon_name',
  MEDIA_ROLE: 'media.role',

  // Event
  EVENT_ID: 'event.id',
  EVENT_DESCRIPTION: 'event.description',
  EVENT_MOUSE_X: 'event.mouse.x',
  EVENT_MOUSE_Y: 'event.mouse.y',
  EVENT_MOUSE_HPOS: 'event.mouse.hpos',
  EVENT_MOUSE_VPOS: 'event.mouse.vpos',
  EVENT_MOUSE_BUTTON: 'event.mouse.button',

  // Window
  WINDOW_NAME: 'window.name',
  WINDOW_ID: 'window.id',
  WINDOW_ICON_NAME: 'window.icon_name',
  WINDOW_X11_DISPLAY: 'window.x11.display',
  WINDOW_X11_SCREEN: 'window.x11.screen',
  WINDOW_X11_MONITOR: 'window.x11.monitor',
  WINDOW_X11_XID: 'window.x11.xid',

  // Application
  APPLICATION_NAME: 'application.name',
  APPLICATION_ID: 'application.id',
  APPLICATION_VERSION: 'application.version',
  APPLICATION_ICON_NAME: 'application.icon_name',
  APPLICATION_LANGUAGE: 'application.language',
  APPLICATION_PROCESS_ID: 'application.process.id',
  APPLICATION_PROCESS_BINARY: 'application.process.binary',
  APPLICATION_PROCESS_USER: 'application.process.user',
  APPLICATION_PROCESS_HOST: 'application.process.host',

  // Backend controls
  CANBERRA_CACHE_CONTROL: 'canberra.cache-control',
  CANBERRA_VOLUME: 'canberra.volume',
  CANBERRA_XDG_THEME_NAME: 'canberra.xdg-theme.name',
  CANBERRA_XDG_THEME_OUTPUT_PROFILE: 'canberra.xdg-theme.output-profile',
  CANBERRA_ENABLE: 'canberra.enable',
  CANBERRA_FORCE_CHANNEL: 'canberra.force_channel',
} as const;

export type SoundAttrName = (typeof SoundAttr)[keyof typeof SoundAttr];
