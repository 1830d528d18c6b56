import { SampleOutOfBoundsError } from '../errors/circle-art.errors';
import { SamplePoint } from '../models/circle-art.interface';
import { createConfig } from '../services/config.service';
import { renderChunk, renderPoint } from '../services/sampling.service';
import { BLACK, RED, solidImage } from './helpers/raster-image.helper';

const inside: SamplePoint = { index: 0, row: 0, column: 0, x: 1, y: 1 };
const outside: SamplePoint = { index: 1, row: 0, column: 1, x: 20, y: 20 };

describe('SamplingService', () => {
  const config = createConfig({ circleDiameter: 2, circleSpacing: 0 });
  const image = solidImage(4, 4, RED);

  describe('renderPoint', () => {
    it('should map the sampled area to a circle', () => {
      expect(renderPoint(image, inside, config)).toEqual({
        index: 0,
        x: 1,
        y: 1,
        radius: 1,
        fill: { r: 255, g: 0, b: 0 },
        opacity: 1
      });
    });

    it('should throw when the disc covers no pixels', () => {
      expect(() => renderPoint(image, outside, config)).toThrow(SampleOutOfBoundsError);
    });
  });

  describe('renderChunk', () => {
    it('should skip failing points and keep going', () => {
      const third: SamplePoint = { index: 2, row: 1, column: 0, x: 1, y: 3 };

      const outcomes = renderChunk([inside, outside, third], image, config);

      expect(outcomes.map(o => o.index)).toEqual([0, 1, 2]);
      expect(outcomes[1]).toEqual({ index: 1, circle: null, reason: 'SAMPLE_OUT_OF_BOUNDS' });
      expect(outcomes[2].circle).toMatchObject({ x: 1, y: 3 });
    });

    it('should mark points the mode leaves bare as empty', () => {
      const halftone = createConfig({
        circleDiameter: 2,
        circleSpacing: 0,
        renderMode: 'halftone-white',
        minDotSize: 0,
        maxDotSize: 1
      });

      const outcomes = renderChunk([inside], solidImage(4, 4, BLACK), halftone);

      expect(outcomes).toEqual([{ index: 0, circle: null, reason: 'empty' }]);
    });

    it('should report every finished point', () => {
      const done: number[] = [];

      renderChunk([inside, outside, inside], image, config, processed => done.push(processed));

      expect(done).toEqual([1, 2, 3]);
    });
  });
});
