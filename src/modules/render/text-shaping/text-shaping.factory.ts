import { Logger } from '@nestjs/common';
import sharp from 'sharp';
import { NativeShapingStrategy } from './native-shaping.strategy';
import { PreShapedStrategy } from './pre-shaped.strategy';
import { TextShapingStrategy } from './text-shaping.strategy';
import { TextShapingMode } from '../../../config/environment.validation';
import { describeError } from '../../utils/errors';

const logger = new Logger('TextShaping');

export type ShapingProbe = () => Promise<boolean>;

/**
 * Whether the sharp build can lay out Hebrew through Pango
 */
export const probeNativeShaping: ShapingProbe = async () => {
  try {
    const { info } = await sharp({ text: { text: 'שלום', rgba: true, dpi: 72 } })
      .png()
      .toBuffer({ resolveWithObject: true });
    return info.width > 0 && info.height > 0;
  } catch (error) {
    logger.debug(`Native text probe failed: ${describeError(error)}`);
    return false;
  }
};

export async function createTextShapingStrategy(
  mode: TextShapingMode,
  probe: ShapingProbe = probeNativeShaping,
): Promise<TextShapingStrategy> {
  let strategy: TextShapingStrategy;
  if (mode === 'native') {
    strategy = new NativeShapingStrategy();
  } else if (mode === 'pre-shaped') {
    strategy = new PreShapedStrategy();
  } else {
    strategy = (await probe()) ? new NativeShapingStrategy() : new PreShapedStrategy();
  }

  logger.log(
    `Hebrew rendering: ${strategy.kind} strategy${mode === 'auto' ? ' (probed)' : ''}`,
  );
  return strategy;
}
