import type { FileEntry } from './listing.ts';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

function renderEntry(file: FileEntry): string {
  const name = escapeHtml(file.name);
  return `<li class="file-item">
        <span class="file-icon">${file.icon}</span>
        <span class="file-name">${name}</span>
        <span class="file-size">${escapeHtml(file.displaySize)}</span>
        <a class="download-btn" href="/download/${escapeHtml(encodeURIComponent(file.name))}">Download</a>
      </li>`;
}

/**
 * Render the landing page: a drop zone that posts to /upload with a progress bar, and the
 * download list.
 */
export function renderListingPage(files: FileEntry[], sharedFolder: string): string {
  const list = files.length > 0 ? files.map(renderEntry).join('\n      ') : `<li class="empty-state">No files in shared folder yet<br><small>${escapeHtml(sharedFolder)}</small></li>`;

  return `<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>QuickDrop</title>
    <style>
      body { font-family: system-ui, sans-serif; max-width: 800px; margin: 0 auto; padding: 20px; }
      .file-list { list-style: none; padding: 0; }
      .file-item { display: flex; gap: 12px; align-items: center; padding: 12px 0; border-bottom: 1px solid #ddd; }
      .file-name { flex: 1; overflow: hidden; text-overflow: ellipsis; white-space: nowrap; }
      .file-size, .empty-state { color: #777; }
      .upload-zone { border: 2px dashed #aaa; border-radius: 8px; padding: 24px; text-align: center; }
      .upload-zone.dragover { border-color: #2a7ae2; background: #eef4fd; }
      .btn { cursor: pointer; color: #2a7ae2; font-weight: 600; }
      .progress progress { width: 100%; }
    </style>
  </head>
  <body>
    <h1>QuickDrop</h1>
    <h2>Upload</h2>
    <div class="upload-zone" id="drop-zone">
      <label class="btn" for="file-input">Select files</label>
      <p>or drag and drop files here</p>
    </div>
    <input type="file" id="file-input" name="files" multiple hidden>
    <div class="progress" id="progress" hidden>
      <progress id="progress-bar" max="100" value="0"></progress>
      <span id="progress-text">Uploading...</span>
    </div>
    <p class="status" id="status"></p>
    <h2>Download</h2>
    <ul class="file-list">
      ${list}
    </ul>
    <script>
      const dropZone = document.getElementById('drop-zone');
      const fileInput = document.getElementById('file-input');
      const progress = document.getElementById('progress');
      const progressBar = document.getElementById('progress-bar');
      const progressText = document.getElementById('progress-text');
      const status = document.getElementById('status');

      function uploadFiles(files) {
        if (files.length === 0) return;
        const body = new FormData();
        for (const file of files) body.append('files', file);

        progress.hidden = false;
        progressBar.value = 0;
        status.textContent = '';

        const xhr = new XMLHttpRequest();
        xhr.upload.addEventListener('progress', (event) => {
          if (!event.lengthComputable) return;
          const percent = Math.round((event.loaded / event.total) * 100);
          progressBar.value = percent;
          progressText.textContent = 'Uploading... ' + percent + '%';
        });
        xhr.addEventListener('load', () => {
          progress.hidden = true;
          if (xhr.status === 200) {
            status.textContent = 'Upload complete';
            setTimeout(() => location.reload(), 1000);
          } else {
            status.textContent = 'Upload failed';
          }
        });
        xhr.addEventListener('error', () => {
          progress.hidden = true;
          status.textContent = 'Upload failed';
        });
        xhr.open('POST', '/upload');
        xhr.send(body);
      }

      fileInput.addEventListener('change', () => uploadFiles(fileInput.files));
      dropZone.addEventListener('dragover', (event) => {
        event.preventDefault();
        dropZone.classList.add('dragover');
      });
      dropZone.addEventListener('dragleave', () => dropZone.classList.remove('dragover'));
      dropZone.addEventListener('drop', (event) => {
        event.preventDefault();
        dropZone.classList.remove('dragover');
        uploadFiles(event.dataTransfer.files);
      });
    </script>
  </body>
</html>
`;
}
