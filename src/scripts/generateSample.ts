import { ArrowCaptchaGenerator } from '../utils/arrowCaptcha';
import { config } from '../config/captcha';
import { sequenceToString } from '../utils/sequenceGenerator';
import * as fs from 'fs';
import * as path from 'path';

const ARROW_NAMES = ['left', 'up', 'right'];

async function generateSample() {
    const zoom = Number(process.argv[2] ?? 2);
    console.log(`Generating sample arrow captcha at zoom ${zoom}...`);

    const generator = new ArrowCaptchaGenerator({ format: config.imageFormat, quality: config.imageQuality });
    const result = await generator.generate(zoom);

    const extension = config.imageFormat === 'png' ? 'png' : 'jpg';
    const outputPath = path.join(process.cwd(), `sample_captcha_x${result.zoom}.${extension}`);
    fs.writeFileSync(outputPath, result.image);

    console.log(`✅ Sample captcha saved to: ${outputPath}`);
    console.log(`   Size: ${result.width}x${result.height}, ${result.image.length} bytes`);
    console.log(`   Answer: ${sequenceToString(result.sequence)} (${result.sequence.map(s => ARROW_NAMES[s]).join(', ')})`);
}

generateSample().catch((error) => {
    console.error('❌ GENERATION FAILED!');
    console.error(error);
    process.exit(1);
});
