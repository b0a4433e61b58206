export function buildControlPage(): string {
  return `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1, user-scalable=no" />
  <title>Rover Control</title>
  <style>
    body { font-family: system-ui, sans-serif; margin: 0; padding-top: 20px; background: #1f2933; color: #e4e7eb; display: flex; flex-direction: column; align-items: center; -webkit-tap-highlight-color: transparent; }
    .container { background: #323f4b; padding: 20px; border-radius: 12px; box-shadow: 0 10px 25px rgba(0, 0, 0, 0.3); width: 90%; max-width: 520px; text-align: center; }
    h1 { color: #3ebd93; margin: 0 0 16px; }
    .video { border: 3px solid #3ebd93; border-radius: 8px; overflow: hidden; background: #000; aspect-ratio: 4 / 3; display: flex; align-items: center; justify-content: center; margin-bottom: 20px; }
    .video img { display: block; max-width: 100%; max-height: 100%; object-fit: contain; }
    .pad { display: grid; grid-template-areas: ". up ." "left stop right" ". down ."; grid-template-columns: 1fr 1fr 1fr; gap: 10px; margin-bottom: 16px; }
    .pad button { background: #3ebd93; color: #1f2933; border: none; border-radius: 8px; padding: 20px; font-size: 1.5em; font-weight: 700; cursor: pointer; user-select: none; touch-action: manipulation; }
    .pad button:active { background: #27ab83; transform: scale(0.95); }
    #btn-up { grid-area: up; } #btn-left { grid-area: left; } #btn-stop { grid-area: stop; } #btn-right { grid-area: right; } #btn-down { grid-area: down; }
    .status { background: #1f2933; padding: 10px; border-radius: 8px; font-size: 0.9em; text-align: left; }
    .status div { margin-bottom: 5px; }
    .light { display: inline-block; width: 10px; height: 10px; border-radius: 50%; margin-right: 8px; background: #7b8794; }
    .light.on { background: #3ebd93; }
    .light.off { background: #ef4e4e; }
    .urls { font-size: 0.8em; margin-top: 12px; word-break: break-all; }
    .urls a { color: #3ebd93; }
  </style>
</head>
<body>
  <div class="container">
    <h1>Rover Control</h1>
    <div class="video">
      <img id="video" src="/video_feed" alt="Video stream loading..." />
    </div>
    <div class="pad">
      <button id="btn-up">&#9650;</button>
      <button id="btn-left">&#9664;</button>
      <button id="btn-stop">&#9632;</button>
      <button id="btn-right">&#9654;</button>
      <button id="btn-down">&#9660;</button>
    </div>
    <div class="status">
      <div id="message">Status: initializing...</div>
      <div><span id="cam-light" class="light"></span>Camera: <span id="cam-status">Unknown</span></div>
      <div><span id="relay-light" class="light"></span>Motor controller: <span id="relay-status">Unknown</span></div>
      <div class="urls" id="urls"></div>
    </div>
  </div>
  <script>
    const REPEAT_MS = 150;
    const video = document.getElementById('video');
    const message = document.getElementById('message');
    let repeat = null;
    let activeKey = null;

    const send = (direction) => {
      fetch('/api/control/' + direction, { method: 'POST' })
        .then((res) => res.json())
        .then((data) => {
          message.textContent = data.status === 'success'
            ? 'Last: ' + direction.toUpperCase() + ' OK'
            : 'Error: ' + data.message;
        })
        .catch(() => { message.textContent = 'Control request failed'; });
    };

    const release = () => {
      if (repeat) {
        clearInterval(repeat);
        repeat = null;
      }
      send('stop');
    };

    const press = (direction) => {
      if (repeat) {
        clearInterval(repeat);
        repeat = null;
      }
      send(direction);
      if (direction !== 'stop') {
        repeat = setInterval(() => send(direction), REPEAT_MS);
      }
    };

    ['up', 'down', 'left', 'right', 'stop'].forEach((direction) => {
      const button = document.getElementById('btn-' + direction);
      const end = (event) => {
        if (event.cancelable) event.preventDefault();
        if (direction !== 'stop' && repeat) release();
      };
      button.addEventListener('mousedown', () => press(direction));
      button.addEventListener('mouseup', end);
      button.addEventListener('mouseleave', end);
      button.addEventListener('touchstart', (event) => { event.preventDefault(); press(direction); }, { passive: false });
      button.addEventListener('touchend', end);
      button.addEventListener('touchcancel', end);
    });

    const keys = { ArrowUp: 'up', w: 'up', ArrowDown: 'down', s: 'down', ArrowLeft: 'left', a: 'left', ArrowRight: 'right', d: 'right', ' ': 'stop', Escape: 'stop' };
    document.addEventListener('keydown', (event) => {
      const direction = keys[event.key];
      if (!direction || event.repeat) return;
      event.preventDefault();
      if (activeKey !== direction) {
        press(direction);
        activeKey = direction;
      }
    });
    document.addEventListener('keyup', (event) => {
      const direction = keys[event.key];
      if (!direction) return;
      event.preventDefault();
      if (direction === 'stop') send('stop');
      else release();
      activeKey = null;
    });

    const reloadVideo = () => { video.src = '/video_feed?' + Date.now(); };
    video.addEventListener('error', () => {
      video.alt = 'Video stream error, retrying...';
      setTimeout(reloadVideo, 3000);
    });

    const refresh = async () => {
      try {
        const res = await fetch('/api/status');
        const data = await res.json();
        document.getElementById('cam-status').textContent = data.camera_running
          ? 'Running (' + data.camera_resolution[0] + 'x' + data.camera_resolution[1] + ' @ ' + data.camera_target_fps + ' FPS)'
          : (data.camera_available ? 'Not running' : 'Unavailable');
        document.getElementById('cam-light').className = 'light ' + (data.camera_running ? 'on' : 'off');
        document.getElementById('relay-status').textContent = data.relay_status;
        document.getElementById('relay-light').className = 'light ' + (data.relay_status === 'Connected' ? 'on' : 'off');

        const urls = document.getElementById('urls');
        urls.textContent = '';
        const addLink = (label, href) => {
          const line = document.createElement('div');
          const link = document.createElement('a');
          link.href = href;
          link.target = '_blank';
          link.textContent = href;
          line.append(label + ': ', link);
          urls.appendChild(line);
        };
        addLink('Local', 'http://' + data.local_ip + ':' + data.web_port);
        if (data.tunnel_url) addLink('Global', data.tunnel_url);

        if (data.camera_running && (!video.complete || video.naturalWidth === 0)) {
          reloadVideo();
        }
      } catch (err) {
        message.textContent = 'Error updating status';
        document.getElementById('cam-light').className = 'light off';
        document.getElementById('relay-light').className = 'light off';
      }
    };
    refresh();
    setInterval(refresh, 5000);
  </script>
</body>
</html>`;
}
