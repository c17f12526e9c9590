/**
 * Page scripts used by the coordinate bridge and the click loop.
 *
 * Each constant is the source of a function taking one JSON argument;
 * `SessionHandle.runScript` evaluates it in the active window. The
 * selection state lives in a single-slot mailbox on `window`: the arm
 * script empties it, the capture layer writes at most one point, and
 * the take script returns and clears it in one evaluation.
 */

export const MAILBOX_KEY = '__browserFleetSelection';
export const OVERLAY_ID = 'browser-fleet-capture-layer';
export const BANNER_ID = 'browser-fleet-banner';

// ── Arm ──────────────────────────────────────────────────────

export type ArmArg = {
  sessionIndex: number;
  message: string;
};

export const ARM_SELECTION_SCRIPT = `(arg) => {
  const previous = window['${MAILBOX_KEY}'];
  if (previous && typeof previous.teardown === 'function') previous.teardown();

  const banner = document.createElement('div');
  banner.id = '${BANNER_ID}';
  Object.assign(banner.style, {
    position: 'fixed', top: '10px', left: '50%', transform: 'translateX(-50%)',
    background: 'rgba(0, 0, 0, 0.8)', color: 'white', padding: '10px 15px',
    borderRadius: '5px', zIndex: '2147483647', fontFamily: 'sans-serif',
    pointerEvents: 'none',
  });
  banner.textContent = arg.message;

  const layer = document.createElement('div');
  layer.id = '${OVERLAY_ID}';
  Object.assign(layer.style, {
    position: 'fixed', top: '0', left: '0', width: '100%', height: '100%',
    background: 'transparent', cursor: 'crosshair', zIndex: '2147483646',
  });

  const mailbox = { sessionIndex: arg.sessionIndex, point: null, teardown: null };

  const onClick = (event) => {
    if (event.button !== 0) return;
    event.preventDefault();
    event.stopPropagation();
    const x = Math.round(event.clientX);
    const y = Math.round(event.clientY);
    mailbox.point = { x, y };
    banner.textContent = 'Selected position: (' + x + ', ' + y + ')';

    const marker = document.createElement('div');
    Object.assign(marker.style, {
      position: 'fixed', left: (x - 5) + 'px', top: (y - 5) + 'px',
      width: '10px', height: '10px', borderRadius: '50%', background: 'red',
      zIndex: '2147483647', pointerEvents: 'none', transition: 'opacity 0.5s ease-out',
    });
    document.body.appendChild(marker);
    setTimeout(() => { marker.style.opacity = '0'; }, 1000);
    setTimeout(() => marker.remove(), 1500);

    layer.removeEventListener('click', onClick);
    layer.remove();
  };

  mailbox.teardown = () => {
    layer.removeEventListener('click', onClick);
    layer.remove();
    banner.remove();
  };

  layer.addEventListener('click', onClick);
  document.body.appendChild(layer);
  document.body.appendChild(banner);
  window['${MAILBOX_KEY}'] = mailbox;
  return true;
}`;

// ── Take ─────────────────────────────────────────────────────

export const TAKE_SELECTION_SCRIPT = `() => {
  const mailbox = window['${MAILBOX_KEY}'];
  if (!mailbox || !mailbox.point) return null;
  const point = mailbox.point;
  mailbox.point = null;
  return point;
}`;

// ── Disarm ───────────────────────────────────────────────────

export const DISARM_SELECTION_SCRIPT = `() => {
  const mailbox = window['${MAILBOX_KEY}'];
  if (mailbox && typeof mailbox.teardown === 'function') mailbox.teardown();
  delete window['${MAILBOX_KEY}'];
  for (const id of ['${OVERLAY_ID}', '${BANNER_ID}']) {
    const el = document.getElementById(id);
    if (el) el.remove();
  }
  return true;
}`;

// ── Click at point ───────────────────────────────────────────

export type PointArg = {
  x: number;
  y: number;
};

/** Resolves to `true` when an element was found at the point. */
export const CLICK_AT_POINT_SCRIPT = `(arg) => {
  const marker = document.createElement('div');
  Object.assign(marker.style, {
    position: 'fixed', left: (arg.x - 5) + 'px', top: (arg.y - 5) + 'px',
    width: '10px', height: '10px', borderRadius: '50%', background: 'red',
    zIndex: '2147483647', pointerEvents: 'none', transition: 'opacity 0.5s',
  });
  document.body.appendChild(marker);
  setTimeout(() => { marker.style.opacity = '0'; }, 500);
  setTimeout(() => marker.remove(), 1000);

  const element = document.elementFromPoint(arg.x, arg.y);
  if (!element) return false;
  if (typeof element.click === 'function') {
    element.click();
  } else {
    element.dispatchEvent(new MouseEvent('click', {
      view: window, bubbles: true, cancelable: true, clientX: arg.x, clientY: arg.y,
    }));
  }
  return true;
}`;

// ── Scroll ───────────────────────────────────────────────────

export type ScrollArg = {
  amount: number;
};

/** Resolves to the vertical scroll offset after scrolling. */
export const SCROLL_BY_SCRIPT = `(arg) => {
  window.scrollBy(0, arg.amount);
  return window.scrollY;
}`;
