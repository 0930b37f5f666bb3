/**
 * Visual analysis of a captured page
 * Picks the on-screen boxes that look like text entry fields
 */

import type { PageSnapshot } from '../crawler/types.js';
import { getLogger } from '../utils/logger.js';
import type { VisualAnalysis, VisualField } from './types.js';

const MIN_ASPECT_RATIO = 2.5;
const MAX_ASPECT_RATIO = 10;
const TEXT_INPUT_ASPECT_RATIO = 5;
const MIN_WIDTH = 100;
const MIN_HEIGHT = 20;
const MAX_HEIGHT = 60;

export class VisualAnalyzer {
  /**
   * Returns null when the page has no screenshot
   */
  public analyze(snapshot: PageSnapshot): VisualAnalysis | null {
    if (!snapshot.screenshotPath) {
      getLogger().debug(`No screenshot for ${snapshot.url}; skipping visual analysis`);
      return null;
    }

    const inputFields: VisualField[] = [];
    snapshot.visualElements.forEach((el, index) => {
      const aspectRatio = el.height > 0 ? el.width / el.height : 0;
      const fieldShaped =
        aspectRatio > MIN_ASPECT_RATIO &&
        aspectRatio < MAX_ASPECT_RATIO &&
        el.width > MIN_WIDTH &&
        el.height > MIN_HEIGHT &&
        el.height < MAX_HEIGHT;

      if (!fieldShaped) return;

      inputFields.push({
        id: `input_${index}`,
        x: el.x,
        y: el.y,
        width: el.width,
        height: el.height,
        type: aspectRatio > TEXT_INPUT_ASPECT_RATIO ? 'text_input' : 'input_field',
        tag: el.tag,
        inputType: el.inputType,
      });
    });

    return {
      inputFields,
      imageDimensions: { ...snapshot.viewport },
    };
  }
}
