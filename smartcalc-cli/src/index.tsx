import { render } from "ink";
import { App } from "./app/app.js";
import { resolveServerUrl } from "./app/protocol.js";

render(<App url={resolveServerUrl()} />);
