import { Page } from "playwright";
import { Logger } from "./logger.js";

/**
 * Flash a fading dot where the agent is about to click. It removes itself before
 * the next screenshot and never intercepts pointer events.
 */
export async function showClickMarker(page: Page, x: number, y: number, logger: Logger): Promise<void> {
  try {
    await page.evaluate(({ px, py }) => {
      const marker = document.createElement('div');
      marker.setAttribute('data-agent-marker', 'click');
      marker.style.position = 'fixed';
      marker.style.left = `${px - 10}px`;
      marker.style.top = `${py - 10}px`;
      marker.style.width = '20px';
      marker.style.height = '20px';
      marker.style.borderRadius = '50%';
      marker.style.background = 'rgba(255, 0, 0, 0.6)';
      marker.style.zIndex = '2147483647';
      marker.style.pointerEvents = 'none';
      marker.style.transition = 'opacity 0.8s, transform 0.8s';
      document.body.appendChild(marker);

      requestAnimationFrame(() => {
        marker.style.opacity = '0';
        marker.style.transform = 'scale(2)';
      });
      setTimeout(() => marker.remove(), 900);
    }, { px: x, py: y });
  } catch (error) {
    // Cosmetic only
    logger.debug('Error showing click marker', { error, x, y });
  }
}
