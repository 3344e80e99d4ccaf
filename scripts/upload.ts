import { FileUploader } from '../src/platform/fileUploader';
import { nodeFileSource } from '../src/platform/nodeFileSource';
import { UPLOAD_BASE_URL } from '../src/config';

const paths = process.argv.slice(2);

if (paths.length === 0) {
  console.error('Usage: npm run upload -- <file> [file...]');
  process.exit(1);
}

const uploader = new FileUploader(nodeFileSource);
console.log(`📤 Uploading ${paths.length} file(s) to ${UPLOAD_BASE_URL}/upload`);

for (const path of paths) {
  await uploader.uploadFile(path);
}
