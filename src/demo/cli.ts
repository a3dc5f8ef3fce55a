import { runConsoleDemo } from "./ConsoleDemo";

runConsoleDemo((line) => console.log(line));
