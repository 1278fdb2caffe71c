import 'dotenv/config';
import { exitOnInterrupt, main } from './cli';


process.on('SIGINT', () => exitOnInterrupt());

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error(err);
    process.exitCode = 1;
  });
