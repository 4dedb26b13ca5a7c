import bodyParser from 'body-parser';
import cors from 'cors';
import dotenv from 'dotenv';
import express from 'express';
import {isRight} from 'fp-ts/lib/Either';
import {PathReporter} from 'io-ts/lib/PathReporter';

import {ArticleAnnotator, annotatorFromConfig} from './articles';
import {loadConfig} from './config';
import {v1ReqArticle, v1ReqText} from './interfaces';
import {createLogger, setVerbose} from './logger';

export interface Reply {
  status: number;
  body: unknown;
}

export function handleText(annotator: ArticleAnnotator, payload: unknown): Reply {
  const body = v1ReqText.decode(payload);
  if (!isRight(body)) { return {status: 400, body: 'bad payload: ' + PathReporter.report(body).join('; ')}; }
  const {text, previewChars} = body.right;
  if (previewChars !== undefined && !(previewChars >= 0)) {
    return {status: 400, body: 'previewChars should be non-negative'};
  }
  return {status: 200, body: annotator.annotateText(text, previewChars)};
}

export function handleArticle(annotator: ArticleAnnotator, payload: unknown): Reply {
  const body = v1ReqArticle.decode(payload);
  if (!isRight(body)) { return {status: 400, body: 'bad payload: ' + PathReporter.report(body).join('; ')}; }
  return {status: 200, body: annotator.processArticle(body.right.article)};
}

export function handleLevels(annotator: ArticleAnnotator): Reply {
  if (annotator.policy.kind !== 'leveled') { return {status: 404, body: 'no level table loaded'}; }
  return {status: 200, body: annotator.policy.toScript()};
}

export function createApp(annotator: ArticleAnnotator): express.Express {
  const app = express();
  app.use(cors({origin: true, credentials: true}));
  app.use(bodyParser.json({limit: '5mb'}));
  app.post('/api/v1/text', (req, res) => {
    const {status, body} = handleText(annotator, req.body);
    res.status(status).json(body);
  });
  app.post('/api/v1/article', (req, res) => {
    const {status, body} = handleArticle(annotator, req.body);
    res.status(status).json(body);
  });
  app.get('/api/v1/levels.js', (_req, res) => {
    const {status, body} = handleLevels(annotator);
    if (status !== 200) {
      res.status(status).json(body);
      return;
    }
    res.type('application/javascript').send(body);
  });
  return app;
}

if (require.main === module) {
  dotenv.config();
  const config = loadConfig();
  setVerbose(config.verbose);
  const log = createLogger('Server');
  annotatorFromConfig(config, log)
      .then(annotator => {
        createApp(annotator).listen(config.port,
                                    () => console.log(`annotation app listening at http://127.0.0.1:${config.port}`));
      })
      .catch(e => {
        log.error(e instanceof Error ? e.message : e);
        process.exit(1);
      });
}
