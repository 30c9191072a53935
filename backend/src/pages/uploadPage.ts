import { PAGE_STYLES } from './layout';

/**
 * Upload page: picks several files, posts each one on its own request and
 * shows a progress bar per file. Browser progress covers the network leg,
 * polling /progress covers what the server has written to disk.
 */
export const UPLOAD_PAGE_HTML = `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>Upload files</title>
  <style>${PAGE_STYLES}
    .upload-container { border: 2px dashed #ccc; padding: 3rem 2rem; text-align: center; border-radius: 8px; margin-bottom: 2rem; }
    #file-input { display: none; }
    .select-btn, .upload-btn { padding: 1.2rem 3rem; border: none; border-radius: 8px; color: white; cursor: pointer; margin: 0.8rem; font-size: 18px; font-weight: bold; min-width: 200px; }
    .select-btn { background: #4285f4; }
    .upload-btn { background: #0f9d58; display: none; }
    .progress-item { margin: 1rem 0; padding: 1rem; border: 1px solid #eee; border-radius: 4px; word-break: break-all; }
    .progress-bar { height: 20px; background: #eee; border-radius: 10px; overflow: hidden; margin-top: 0.5rem; }
    .progress-fill { height: 100%; background: #4285f4; width: 0%; transition: width 0.3s ease; }
    .progress-fill.done { background: #0f9d58; }
    .progress-fill.failed { background: #ea4335; }
    .saved-text { color: #666; font-size: 0.9em; }
  </style>
</head>
<body>
  <h1>Upload files</h1>
  <div class="upload-container">
    <button class="select-btn" onclick="document.getElementById('file-input').click()">Choose files</button>
    <input type="file" id="file-input" multiple>
    <button class="upload-btn" id="upload-btn">Start upload</button>
  </div>
  <div id="file-list"></div>
  <div class="nav-link"><a href="/download-page">Go to downloads</a></div>

  <script>
    let files = [];
    const fileInput = document.getElementById('file-input');
    const uploadBtn = document.getElementById('upload-btn');
    const fileList = document.getElementById('file-list');

    fileInput.addEventListener('change', () => {
      files = Array.from(fileInput.files);
      fileList.innerHTML = '';
      uploadBtn.style.display = files.length > 0 ? 'inline-block' : 'none';
      files.forEach((file, index) => {
        const item = document.createElement('div');
        item.className = 'progress-item';
        const name = document.createElement('div');
        name.textContent = file.name + ' (' + formatSize(file.size) + ')';
        const bar = document.createElement('div');
        bar.className = 'progress-bar';
        bar.innerHTML = '<div class="progress-fill" id="progress-' + index + '"></div>';
        const text = document.createElement('div');
        text.id = 'progress-text-' + index;
        text.textContent = '0%';
        const saved = document.createElement('div');
        saved.className = 'saved-text';
        saved.id = 'saved-text-' + index;
        item.append(name, bar, text, saved);
        fileList.appendChild(item);
      });
    });

    uploadBtn.addEventListener('click', () => {
      files.forEach(uploadFile);
      uploadBtn.style.display = 'none';
      fileInput.value = '';
    });

    function formatSize(bytes) {
      if (bytes < 1024) return bytes + ' B';
      if (bytes < 1048576) return (bytes / 1024).toFixed(1) + ' KB';
      return (bytes / 1048576).toFixed(1) + ' MB';
    }

    function newUploadId() {
      return Date.now().toString(36) + Math.random().toString(36).substring(2, 12);
    }

    function uploadFile(file, index) {
      const uploadId = newUploadId();
      const formData = new FormData();
      formData.append('file', file);

      const poll = setInterval(async () => {
        try {
          const res = await fetch('/progress?uploadId=' + uploadId);
          const progress = await res.json();
          if (progress.total > 0) {
            document.getElementById('saved-text-' + index).textContent =
              'Saved ' + formatSize(progress.uploaded) + ' of ' + formatSize(progress.total);
          }
        } catch (err) {
          console.warn('progress poll failed', err);
        }
      }, 500);

      const xhr = new XMLHttpRequest();
      xhr.open('POST', '/upload?uploadId=' + uploadId + '&size=' + file.size, true);
      xhr.upload.addEventListener('progress', (e) => {
        if (e.lengthComputable) updateProgress(index, (e.loaded / e.total) * 100);
      });
      xhr.onload = () => {
        clearInterval(poll);
        if (xhr.status === 200) {
          updateProgress(index, 100, 'Upload complete', 'done');
        } else {
          let reason = xhr.statusText;
          try { reason = JSON.parse(xhr.responseText).error || reason; } catch (err) { /* not JSON */ }
          updateProgress(index, 100, 'Upload failed: ' + reason, 'failed');
        }
      };
      xhr.onerror = () => {
        clearInterval(poll);
        updateProgress(index, 100, 'Upload failed (network error)', 'failed');
      };
      xhr.send(formData);
    }

    function updateProgress(index, percent, text, state) {
      const fill = document.getElementById('progress-' + index);
      fill.style.width = percent + '%';
      if (state) fill.classList.add(state);
      document.getElementById('progress-text-' + index).textContent = text || Math.round(percent) + '%';
    }
  </script>
</body>
</html>
`;
